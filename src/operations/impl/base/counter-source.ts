/**
 * Counter Source
 *
 * Emits an increasing sequence of integers. Runs on its own task since
 * nothing upstream triggers it.
 */

import { z } from 'zod';
import { ProcessingMode } from '../../../types/operation.types.js';
import { intVariant } from '../../../variant/variant.js';
import { DefaultOperation } from '../../default-operation.js';

export class CounterSource extends DefaultOperation {
  static readonly TYPE = 'CounterSource';
  readonly type = CounterSource.TYPE;

  private first = 0;
  private step = 1;
  private maxCount = -1;
  private autoStop = true;

  private next = 0;
  private emitted = 0;

  constructor(name: string) {
    super(name, { processingMode: ProcessingMode.THREADED });
    this.addOutput('output');

    this.properties
      .define('start', {
        schema: z.number().int(),
        get: () => this.first,
        set: (value) => {
          this.first = value;
          this.next = value;
        },
        description: 'First value emitted',
      })
      .define('step', {
        schema: z.number().int(),
        get: () => this.step,
        set: (value) => {
          this.step = value;
        },
      })
      .define('maxCount', {
        schema: z.number().int().min(-1),
        get: () => this.maxCount,
        set: (value) => {
          this.maxCount = value;
        },
        description: 'Items per run, -1 for no limit',
      })
      .define('autoStop', {
        schema: z.boolean(),
        get: () => this.autoStop,
        set: (value) => {
          this.autoStop = value;
        },
        description: 'Stop after maxCount items instead of pausing',
      });
  }

  protected reset(): void {
    this.next = this.first;
    this.emitted = 0;
  }

  protected async process(): Promise<void> {
    if (this.limitReached()) {
      this.finishBatch();
      return;
    }

    const value = this.next;
    this.next += this.step;
    this.emitted++;
    await this.emit('output', intVariant(value));

    if (this.limitReached()) {
      this.finishBatch();
    }
  }

  private limitReached(): boolean {
    return this.maxCount >= 0 && this.emitted >= this.maxCount;
  }

  private finishBatch(): void {
    if (this.autoStop) {
      this.stop();
    } else {
      // Counting continues from here on the next start()
      this.emitted = 0;
      this.pause();
    }
  }
}
