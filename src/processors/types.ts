/**
 * Processor Types
 *
 * A processor decides on which task an operation's processing steps run.
 * The operation itself serializes steps; the processor only drives them.
 */

import type { ProcessingMode } from '../types/operation.types.js';

/**
 * The operation side of a processor
 */
export interface ProcessorHost {
  readonly name: string;
  /** True when the operation has no connected inputs */
  readonly isSource: boolean;
  /**
   * Run at most one processing step.
   * Resolves true when the step made progress. Never rejects.
   */
  processNext(): Promise<boolean>;
}

export interface Processor {
  readonly mode: ProcessingMode;
  /** Begin driving the host */
  start(): void;
  /** Stop driving the host. A step in flight runs to completion. */
  stop(): void;
  /**
   * Input arrived or the host changed state. A synchronous processor runs
   * the ready steps before resolving; a threaded one only wakes its loop.
   */
  notify(): Promise<void>;
  readonly active: boolean;
}
