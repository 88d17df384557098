/**
 * Operation Implementations
 *
 * Built-in leaf operations, organized by category:
 * - base/  - sources and tracing
 * - math/  - scalar arithmetic
 * - image/ - image statistics
 */

// Base operations
export { CounterSource } from './base/counter-source.js';
export { DebugOperation, DebugStream, DEFAULT_DEBUG_FORMAT } from './base/debug-operation.js';
export type { DebugOperationOptions, DebugWriter } from './base/debug-operation.js';

// Math operations
export { ArithmeticOperation, ArithmeticOperator } from './math/arithmetic-operation.js';

// Image operations
export { HistogramOperation, MAX_HISTOGRAM_LEVELS } from './image/histogram-operation.js';
