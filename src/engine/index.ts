export { Engine, ROOT_NAME } from './engine.js';
export type { ExecuteOptions, ExecutionResult } from './engine.js';
export { createEngineContext } from './context.js';
export type { EngineContext } from './context.js';
export { buildGraph, populateCompound, serializeGraph } from './graph-io.js';
export {
  GRAPH_DOCUMENT_VERSION,
  connectionDocumentSchema,
  graphDocumentSchema,
  operationDocumentSchema,
} from './graph-schema.js';
export type {
  ConnectionDocument,
  GraphDocument,
  GraphDocumentInput,
  OperationDocument,
} from './graph-schema.js';
