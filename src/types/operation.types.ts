import type { FlowError } from '../utils/errors.js';

/**
 * Operation lifecycle states
 */
export const OperationState = {
  STOPPED: 'stopped',
  STARTING: 'starting',
  RUNNING: 'running',
  PAUSING: 'pausing',
  PAUSED: 'paused',
  STOPPING: 'stopping',
  INTERRUPTED: 'interrupted',
} as const;

export type OperationState = (typeof OperationState)[keyof typeof OperationState];

/**
 * Execution strategy bound to a leaf operation
 */
export const ProcessingMode = {
  THREADED: 'threaded',
  SYNCHRONOUS: 'synchronous',
} as const;

export type ProcessingMode = (typeof ProcessingMode)[keyof typeof ProcessingMode];

/**
 * A captured failure with the identity of the operation that raised it
 */
export interface OperationFailure {
  /** Name of the failing operation */
  operation: string;
  error: FlowError;
}

export type StateListener = (state: OperationState, previous: OperationState, operation: string) => void;

export type ErrorListener = (failure: OperationFailure) => void;

/**
 * Per-run processing counters, reset by check(true)
 */
export interface OperationStatistics {
  steps: number;
  totalStepMs: number;
  maxStepMs: number;
  discardedItems: number;
}
