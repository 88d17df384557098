/**
 * Debug Operation
 *
 * Passes every item through unchanged and prints a line for it. Useful for
 * watching what travels over a connection.
 */

import { z } from 'zod';
import type { InputSet } from '../../../flow/types.js';
import { ControlTag, type Variant } from '../../../types/variant.types.js';
import {
  controlVariant,
  describeVariant,
  variantSymbol,
  variantTypeName,
} from '../../../variant/variant.js';
import { DefaultOperation, type DefaultOperationOptions } from '../../default-operation.js';

export const DebugStream = {
  STDOUT: 'stdout',
  STDERR: 'stderr',
  LOG: 'log',
} as const;

export type DebugStream = (typeof DebugStream)[keyof typeof DebugStream];

export type DebugWriter = (text: string, stream: typeof DebugStream.STDOUT | typeof DebugStream.STDERR) => void;

export interface DebugOperationOptions extends DefaultOperationOptions {
  /** Replaces process.stdout/stderr, mainly for tests */
  write?: DebugWriter;
}

export const DEFAULT_DEBUG_FORMAT = '$objectName: $type received ($count since reset)\n';

const VARIABLE = /\$(objectName|count|type|value|symbol)/g;

const writeToProcess: DebugWriter = (text, stream) => {
  process[stream].write(text);
};

export class DebugOperation extends DefaultOperation {
  static readonly TYPE = 'DebugOperation';
  readonly type = DebugOperation.TYPE;

  private format = DEFAULT_DEBUG_FORMAT;
  private outputStream: DebugStream = DebugStream.STDOUT;
  private showControlObjects = false;
  private count = 0;
  private readonly write: DebugWriter;

  constructor(name: string, options: DebugOperationOptions = {}) {
    super(name, options);
    this.write = options.write ?? writeToProcess;
    this.addInput('input');
    this.addOutput('output');

    this.properties
      .define('format', {
        schema: z.string(),
        get: () => this.format,
        set: (value) => {
          this.format = value;
        },
        description: 'Line format with $objectName, $count, $type, $value and $symbol',
      })
      .define('outputStream', {
        schema: z.nativeEnum(DebugStream),
        get: () => this.outputStream,
        set: (value) => {
          this.outputStream = value;
        },
      })
      .define('showControlObjects', {
        schema: z.boolean(),
        get: () => this.showControlObjects,
        set: (value) => {
          this.showControlObjects = value;
        },
      });
  }

  protected reset(): void {
    this.count = 0;
  }

  protected async process(inputs: InputSet): Promise<void> {
    const item = inputs.require('input');
    this.count++;
    this.print(item);
    await this.emit('output', item);
  }

  protected controlReceived(tag: ControlTag): void {
    if (this.showControlObjects) {
      this.print(controlVariant(tag));
    }
  }

  private print(item: Variant): void {
    const text = this.format.replace(VARIABLE, (_match, variable: string) => {
      switch (variable) {
        case 'objectName':
          return this.name;
        case 'count':
          return String(this.count);
        case 'type':
          return variantTypeName(item);
        case 'value':
          return describeVariant(item);
        default:
          return variantSymbol(item);
      }
    });

    if (this.outputStream === DebugStream.LOG) {
      this.logger.info({ type: variantTypeName(item) }, text.trimEnd());
    } else {
      this.write(text, this.outputStream);
    }
  }
}
