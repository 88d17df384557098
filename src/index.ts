/**
 * flowgraph
 *
 * In-process dataflow engine: operations connected through sockets, run
 * as a graph with data and control tags flowing in order.
 */

// Values
export * from './types/variant.types.js';
export * from './variant/variant.js';

// Operations
export * from './types/operation.types.js';
export { Operation } from './operations/operation.js';
export { DefaultOperation, type DefaultOperationOptions } from './operations/default-operation.js';
export { Compound } from './operations/compound.js';
export { PropertyTable, type PropertyDefinition, type PropertyInfo } from './operations/properties.js';
export { OperationRegistry, type OperationFactory, type OperationTypeInfo } from './operations/registry.js';
export { createDefaultRegistry, registerBuiltInOperations } from './operations/setup.js';
export * from './operations/impl/index.js';

// Plumbing
export * from './sockets/index.js';
export * from './flow/index.js';
export * from './processors/index.js';

// Engine
export * from './engine/index.js';

// Ambient
export { getConfig, resetConfig, type AppConfig } from './config/index.js';
export * from './utils/errors.js';
export { createChildLogger, getLogger, type Logger } from './utils/logger.js';
export { ExecutionTimer, formatDuration, type ExecutionSummary } from './utils/timer.js';
