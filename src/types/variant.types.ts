/**
 * Data type tags
 */
export const VariantType = {
  INT: 'int',
  DOUBLE: 'double',
  BOOL: 'bool',
  STRING: 'string',
  COMPLEX: 'complex',
  INT_MATRIX: 'int-matrix',
  UINT8_MATRIX: 'uint8-matrix',
  DOUBLE_MATRIX: 'double-matrix',
  BOOL_MATRIX: 'bool-matrix',
  COMPLEX_MATRIX: 'complex-matrix',
} as const;

export type VariantType = (typeof VariantType)[keyof typeof VariantType];

/**
 * Control tag types. Disjoint from data type tags, never read as data.
 */
export const ControlTag = {
  SYNC_START: 'sync-start',
  SYNC_END: 'sync-end',
  STOP: 'stop',
  PAUSE: 'pause',
  RESUME: 'resume',
} as const;

export type ControlTag = (typeof ControlTag)[keyof typeof ControlTag];

export interface Complex {
  readonly re: number;
  readonly im: number;
}

/**
 * Row-major matrix
 */
export interface Matrix<T> {
  readonly rows: number;
  readonly columns: number;
  readonly data: readonly T[];
}

export type DataVariant =
  | { readonly type: typeof VariantType.INT; readonly value: number }
  | { readonly type: typeof VariantType.DOUBLE; readonly value: number }
  | { readonly type: typeof VariantType.BOOL; readonly value: boolean }
  | { readonly type: typeof VariantType.STRING; readonly value: string }
  | { readonly type: typeof VariantType.COMPLEX; readonly value: Complex }
  | { readonly type: typeof VariantType.INT_MATRIX; readonly value: Matrix<number> }
  | { readonly type: typeof VariantType.UINT8_MATRIX; readonly value: Matrix<number> }
  | { readonly type: typeof VariantType.DOUBLE_MATRIX; readonly value: Matrix<number> }
  | { readonly type: typeof VariantType.BOOL_MATRIX; readonly value: Matrix<boolean> }
  | { readonly type: typeof VariantType.COMPLEX_MATRIX; readonly value: Matrix<Complex> };

export interface ControlVariant {
  readonly type: ControlTag;
}

/**
 * One item flowing through a socket. Dispatch on `type` before reading `value`.
 */
export type Variant = DataVariant | ControlVariant;

export type VariantOf<T extends VariantType> = Extract<DataVariant, { type: T }>;

export type MatrixVariant = VariantOf<
  | typeof VariantType.INT_MATRIX
  | typeof VariantType.UINT8_MATRIX
  | typeof VariantType.DOUBLE_MATRIX
  | typeof VariantType.BOOL_MATRIX
  | typeof VariantType.COMPLEX_MATRIX
>;
