/**
 * Graph document schema
 *
 * The persisted form of a graph: operations with their type and property
 * values, connections, and the ports a compound exposes. Runtime state is
 * never part of it.
 */

import { z } from 'zod';

export const GRAPH_DOCUMENT_VERSION = 1;

const NAME_PATTERN = /^[A-Za-z_][\w-]*$/;
const PATH_PATTERN = /^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/;

const operationName = z.string().regex(NAME_PATTERN, 'Invalid operation name');
const portPath = z.string().regex(PATH_PATTERN, 'Invalid socket path');

export const connectionDocumentSchema = z
  .object({
    output: portPath,
    inputs: z.array(portPath).min(1),
  })
  .strict();

export type ConnectionDocument = z.infer<typeof connectionDocumentSchema>;

export interface OperationDocument {
  type: string;
  properties?: Record<string, unknown>;
  /** Children, for compound entries */
  operations?: Record<string, OperationDocument>;
  connections?: ConnectionDocument[];
  inputs?: Record<string, string>;
  outputs?: Record<string, string>;
}

export const operationDocumentSchema: z.ZodType<OperationDocument> = z.lazy(() =>
  z
    .object({
      type: z.string().min(1),
      properties: z.record(z.unknown()).optional(),
      operations: z.record(operationName, operationDocumentSchema).optional(),
      connections: z.array(connectionDocumentSchema).optional(),
      inputs: z.record(operationName, portPath).optional(),
      outputs: z.record(operationName, portPath).optional(),
    })
    .strict()
);

export const graphDocumentSchema = z
  .object({
    version: z.literal(GRAPH_DOCUMENT_VERSION),
    operations: z.record(operationName, operationDocumentSchema).default({}),
    connections: z.array(connectionDocumentSchema).default([]),
    inputs: z.record(operationName, portPath).default({}),
    outputs: z.record(operationName, portPath).default({}),
  })
  .strict();

export type GraphDocument = z.infer<typeof graphDocumentSchema>;
export type GraphDocumentInput = z.input<typeof graphDocumentSchema>;
