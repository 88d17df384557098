/**
 * Processors
 *
 * Execution strategies bound to leaf operations:
 * - threaded: an independent async loop per operation
 * - synchronous: steps run inline on the delivering task
 */

import { ProcessingMode } from '../types/operation.types.js';
import { SynchronousProcessor } from './synchronous.js';
import { ThreadedProcessor } from './threaded.js';
import type { Processor, ProcessorHost } from './types.js';

export function createProcessor(mode: ProcessingMode, host: ProcessorHost): Processor {
  switch (mode) {
    case ProcessingMode.THREADED:
      return new ThreadedProcessor(host);
    case ProcessingMode.SYNCHRONOUS:
      return new SynchronousProcessor(host);
  }
}

export { SynchronousProcessor } from './synchronous.js';
export { ThreadedProcessor } from './threaded.js';
export type { Processor, ProcessorHost } from './types.js';
