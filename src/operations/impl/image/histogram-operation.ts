/**
 * Histogram Operation
 *
 * Counts the gray levels of an integer image, optionally only where a
 * region-of-interest mask is set. One 1-by-levels double matrix is emitted
 * per image.
 */

import { z } from 'zod';
import type { InputSet } from '../../../flow/types.js';
import { OperationState, ProcessingMode } from '../../../types/operation.types.js';
import { VariantType, type DataVariant, type Matrix } from '../../../types/variant.types.js';
import { doubleMatrix } from '../../../variant/variant.js';
import { ExecutionError, UnsupportedTypeError } from '../../../utils/errors.js';
import { DefaultOperation } from '../../default-operation.js';

export const MAX_HISTOGRAM_LEVELS = 65536;

export class HistogramOperation extends DefaultOperation {
  static readonly TYPE = 'HistogramOperation';
  readonly type = HistogramOperation.TYPE;

  private levels = 256;
  private normalized = false;
  /** Allocated when a run starts, released when the operation stops */
  private bins: Float64Array | undefined;

  constructor(name: string) {
    super(name, { processingMode: ProcessingMode.THREADED });
    this.addInput('image');
    this.addInput('roi', { optional: true });
    this.addOutput('histogram');

    this.properties
      .define('levels', {
        schema: z.number().int().min(1).max(MAX_HISTOGRAM_LEVELS),
        get: () => this.levels,
        set: (value) => {
          this.levels = value;
        },
        description: 'Number of bins; values outside [0, levels) are ignored',
      })
      .define('normalized', {
        schema: z.boolean(),
        get: () => this.normalized,
        set: (value) => {
          this.normalized = value;
        },
        description: 'Scale the bins to sum to one',
      });
  }

  protected willChangeState(next: OperationState): void {
    if (next === OperationState.STARTING && !this.bins) {
      this.bins = new Float64Array(this.levels);
    } else if (next === OperationState.STOPPED || next === OperationState.INTERRUPTED) {
      this.bins = undefined;
    }
  }

  protected async process(inputs: InputSet): Promise<void> {
    const image = this.integerImage(inputs.require('image'));
    const roi = inputs.get('roi');
    const mask = roi ? this.mask(roi) : undefined;

    if (mask && (mask.rows !== image.rows || mask.columns !== image.columns)) {
      throw new ExecutionError(
        `ROI size ${mask.rows}-by-${mask.columns} does not match image size ${image.rows}-by-${image.columns}`
      );
    }

    const bins = this.clearedBins();

    let total = 0;
    image.data.forEach((value, index) => {
      if (mask && !mask.data[index]) {
        return;
      }
      if (value >= 0 && value < bins.length) {
        bins[value]++;
        total++;
      }
    });

    if (this.normalized && total > 0) {
      for (let i = 0; i < bins.length; i++) {
        bins[i] /= total;
      }
    }

    await this.emit('histogram', doubleMatrix(1, bins.length, Array.from(bins)));
  }

  private clearedBins(): Float64Array {
    if (!this.bins || this.bins.length !== this.levels) {
      this.bins = new Float64Array(this.levels);
    }
    return this.bins.fill(0);
  }

  private integerImage(item: DataVariant): Matrix<number> {
    switch (item.type) {
      case VariantType.INT_MATRIX:
      case VariantType.UINT8_MATRIX:
        return item.value;
      default:
        throw new UnsupportedTypeError(this.resolveInput('image').path, item.type);
    }
  }

  private mask(item: DataVariant): Matrix<boolean> {
    switch (item.type) {
      case VariantType.BOOL_MATRIX:
        return item.value;
      case VariantType.INT_MATRIX:
      case VariantType.UINT8_MATRIX: {
        const { rows, columns, data } = item.value;
        return { rows, columns, data: data.map((value) => value !== 0) };
      }
      default:
        throw new UnsupportedTypeError(this.resolveInput('roi').path, item.type);
    }
  }
}
