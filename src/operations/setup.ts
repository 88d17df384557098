/**
 * Operation Setup
 *
 * Registers the built-in operation types with a registry.
 */

import { OperationRegistry } from './registry.js';
import {
  ArithmeticOperation,
  CounterSource,
  DebugOperation,
  HistogramOperation,
} from './impl/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'operation-setup' });

/**
 * Register all built-in leaf operations
 */
export function registerBuiltInOperations(registry: OperationRegistry): void {
  registry.register(CounterSource.TYPE, (name) => new CounterSource(name), 'Emits an increasing integer sequence');
  registry.register(DebugOperation.TYPE, (name) => new DebugOperation(name), 'Prints and passes through every item');
  registry.register(
    ArithmeticOperation.TYPE,
    (name) => new ArithmeticOperation(name),
    'Adds, subtracts, multiplies or divides two scalars'
  );
  registry.register(
    HistogramOperation.TYPE,
    (name) => new HistogramOperation(name),
    'Gray-level histogram of an integer image'
  );

  logger.debug({ types: registry.getTypes() }, 'Built-in operations registered');
}

/**
 * A registry holding the built-in operations
 */
export function createDefaultRegistry(): OperationRegistry {
  const registry = new OperationRegistry();
  registerBuiltInOperations(registry);
  return registry;
}
