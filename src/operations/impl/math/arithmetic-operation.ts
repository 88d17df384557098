/**
 * Arithmetic Operation
 *
 * Combines one scalar from each input. Two ints give an int (division
 * truncates toward zero); anything involving a double gives a double.
 */

import { z } from 'zod';
import type { InputSet } from '../../../flow/types.js';
import { VariantType, type DataVariant } from '../../../types/variant.types.js';
import { doubleVariant, intVariant } from '../../../variant/variant.js';
import { ExecutionError, UnsupportedTypeError } from '../../../utils/errors.js';
import { DefaultOperation, type DefaultOperationOptions } from '../../default-operation.js';

export const ArithmeticOperator = {
  ADD: 'add',
  SUBTRACT: 'subtract',
  MULTIPLY: 'multiply',
  DIVIDE: 'divide',
} as const;

export type ArithmeticOperator = (typeof ArithmeticOperator)[keyof typeof ArithmeticOperator];

interface Scalar {
  value: number;
  integer: boolean;
}

function apply(operator: ArithmeticOperator, a: number, b: number): number {
  switch (operator) {
    case ArithmeticOperator.ADD:
      return a + b;
    case ArithmeticOperator.SUBTRACT:
      return a - b;
    case ArithmeticOperator.MULTIPLY:
      return a * b;
    case ArithmeticOperator.DIVIDE:
      return a / b;
  }
}

export class ArithmeticOperation extends DefaultOperation {
  static readonly TYPE = 'ArithmeticOperation';
  readonly type = ArithmeticOperation.TYPE;

  private operator: ArithmeticOperator = ArithmeticOperator.ADD;

  constructor(name: string, options: DefaultOperationOptions = {}) {
    super(name, options);
    this.addInput('input0');
    this.addInput('input1');
    this.addOutput('output');

    this.properties.define('operator', {
      schema: z.nativeEnum(ArithmeticOperator),
      get: () => this.operator,
      set: (value) => {
        this.operator = value;
      },
      description: 'add, subtract, multiply or divide',
    });
  }

  protected async process(inputs: InputSet): Promise<void> {
    const a = this.scalar(inputs, 'input0');
    const b = this.scalar(inputs, 'input1');

    if (a.integer && b.integer) {
      if (this.operator === ArithmeticOperator.DIVIDE && b.value === 0) {
        throw new ExecutionError(`Integer division by zero in ${this.path}`);
      }
      const result = apply(this.operator, a.value, b.value);
      await this.emit('output', intVariant(Math.trunc(result)));
      return;
    }

    await this.emit('output', doubleVariant(apply(this.operator, a.value, b.value)));
  }

  private scalar(inputs: InputSet, socket: string): Scalar {
    const item: DataVariant = inputs.require(socket);
    switch (item.type) {
      case VariantType.INT:
        return { value: item.value, integer: true };
      case VariantType.DOUBLE:
        return { value: item.value, integer: false };
      default:
        throw new UnsupportedTypeError(this.resolveInput(socket).path, item.type);
    }
  }
}
