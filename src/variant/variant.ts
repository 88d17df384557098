/**
 * Variant constructors and readers
 *
 * Every value crossing a socket is a Variant. Data constructors validate
 * their payload; control tags are shared frozen singletons.
 */

import {
  ControlTag,
  VariantType,
  type Complex,
  type ControlVariant,
  type DataVariant,
  type Matrix,
  type MatrixVariant,
  type Variant,
  type VariantOf,
} from '../types/variant.types.js';
import { ValidationError } from '../utils/errors.js';

const CONTROL_TAGS: ReadonlySet<string> = new Set(Object.values(ControlTag));

const CONTROL_VARIANTS: Record<ControlTag, ControlVariant> = {
  [ControlTag.SYNC_START]: Object.freeze({ type: ControlTag.SYNC_START }),
  [ControlTag.SYNC_END]: Object.freeze({ type: ControlTag.SYNC_END }),
  [ControlTag.STOP]: Object.freeze({ type: ControlTag.STOP }),
  [ControlTag.PAUSE]: Object.freeze({ type: ControlTag.PAUSE }),
  [ControlTag.RESUME]: Object.freeze({ type: ControlTag.RESUME }),
};

const CONTROL_SYMBOLS: Record<ControlTag, string> = {
  [ControlTag.SYNC_START]: '<',
  [ControlTag.SYNC_END]: '>',
  [ControlTag.STOP]: 'S',
  [ControlTag.PAUSE]: 'P',
  [ControlTag.RESUME]: 'R',
};

/** Matrices larger than this are summarized instead of printed in full */
const MAX_DESCRIBED_ELEMENTS = 64;

export function intVariant(value: number): VariantOf<typeof VariantType.INT> {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`Not an integer: ${value}`);
  }
  return { type: VariantType.INT, value };
}

export function doubleVariant(value: number): VariantOf<typeof VariantType.DOUBLE> {
  return { type: VariantType.DOUBLE, value };
}

export function boolVariant(value: boolean): VariantOf<typeof VariantType.BOOL> {
  return { type: VariantType.BOOL, value };
}

export function stringVariant(value: string): VariantOf<typeof VariantType.STRING> {
  return { type: VariantType.STRING, value };
}

export function complexVariant(re: number, im: number): VariantOf<typeof VariantType.COMPLEX> {
  return { type: VariantType.COMPLEX, value: { re, im } };
}

/**
 * Build a matrix, checking that the row-major data fills it exactly
 */
export function createMatrix<T>(rows: number, columns: number, data: readonly T[]): Matrix<T> {
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows < 0 || columns < 0) {
    throw new ValidationError(`Invalid matrix size ${rows}-by-${columns}`);
  }
  if (data.length !== rows * columns) {
    throw new ValidationError(
      `Matrix data has ${data.length} elements, expected ${rows * columns} for ${rows}-by-${columns}`
    );
  }
  return { rows, columns, data };
}

export function intMatrix(
  rows: number,
  columns: number,
  data: readonly number[]
): VariantOf<typeof VariantType.INT_MATRIX> {
  if (!data.every(Number.isInteger)) {
    throw new ValidationError('Integer matrix contains non-integer elements');
  }
  return { type: VariantType.INT_MATRIX, value: createMatrix(rows, columns, data) };
}

export function uint8Matrix(
  rows: number,
  columns: number,
  data: readonly number[]
): VariantOf<typeof VariantType.UINT8_MATRIX> {
  if (!data.every((v) => Number.isInteger(v) && v >= 0 && v <= 255)) {
    throw new ValidationError('8-bit matrix contains elements outside 0..255');
  }
  return { type: VariantType.UINT8_MATRIX, value: createMatrix(rows, columns, data) };
}

export function doubleMatrix(
  rows: number,
  columns: number,
  data: readonly number[]
): VariantOf<typeof VariantType.DOUBLE_MATRIX> {
  return { type: VariantType.DOUBLE_MATRIX, value: createMatrix(rows, columns, data) };
}

export function boolMatrix(
  rows: number,
  columns: number,
  data: readonly boolean[]
): VariantOf<typeof VariantType.BOOL_MATRIX> {
  return { type: VariantType.BOOL_MATRIX, value: createMatrix(rows, columns, data) };
}

export function complexMatrix(
  rows: number,
  columns: number,
  data: readonly Complex[]
): VariantOf<typeof VariantType.COMPLEX_MATRIX> {
  return { type: VariantType.COMPLEX_MATRIX, value: createMatrix(rows, columns, data) };
}

/**
 * Shared control tag instance
 */
export function controlVariant(tag: ControlTag): ControlVariant {
  return CONTROL_VARIANTS[tag];
}

export function isControlTagType(type: string): type is ControlTag {
  return CONTROL_TAGS.has(type);
}

export function isControlTag(variant: Variant): variant is ControlVariant {
  return isControlTagType(variant.type);
}

export function isDataVariant(variant: Variant): variant is DataVariant {
  return !isControlTag(variant);
}

export function isMatrixVariant(variant: Variant): variant is MatrixVariant {
  switch (variant.type) {
    case VariantType.INT_MATRIX:
    case VariantType.UINT8_MATRIX:
    case VariantType.DOUBLE_MATRIX:
    case VariantType.BOOL_MATRIX:
    case VariantType.COMPLEX_MATRIX:
      return true;
    default:
      return false;
  }
}

export function variantTypeName(variant: Variant): string {
  return variant.type;
}

/**
 * One-character symbol: '.' for data, tag-specific for control
 */
export function variantSymbol(variant: Variant): string {
  return isControlTag(variant) ? CONTROL_SYMBOLS[variant.type] : '.';
}

function describeComplex(value: Complex): string {
  const sign = value.im < 0 ? '-' : '+';
  return `${value.re}${sign}${Math.abs(value.im)}i`;
}

function describeMatrix<T>(matrix: Matrix<T>, element: (value: T) => string): string {
  if (matrix.data.length > MAX_DESCRIBED_ELEMENTS) {
    return `<${matrix.rows}-by-${matrix.columns} matrix>`;
  }
  const rows: string[] = [];
  for (let r = 0; r < matrix.rows; r++) {
    const row = matrix.data.slice(r * matrix.columns, (r + 1) * matrix.columns);
    rows.push(row.map(element).join(' '));
  }
  return `[${rows.join('; ')}]`;
}

/**
 * Human-readable rendering of a variant's value
 */
export function describeVariant(variant: Variant): string {
  if (isControlTag(variant)) {
    return variant.type;
  }
  switch (variant.type) {
    case VariantType.INT:
    case VariantType.DOUBLE:
    case VariantType.BOOL:
      return String(variant.value);
    case VariantType.STRING:
      return variant.value;
    case VariantType.COMPLEX:
      return describeComplex(variant.value);
    case VariantType.INT_MATRIX:
    case VariantType.UINT8_MATRIX:
    case VariantType.DOUBLE_MATRIX:
      return describeMatrix(variant.value, String);
    case VariantType.BOOL_MATRIX:
      return describeMatrix(variant.value, (v) => (v ? '1' : '0'));
    case VariantType.COMPLEX_MATRIX:
      return describeMatrix(variant.value, describeComplex);
  }
}
