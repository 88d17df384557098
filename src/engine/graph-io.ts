/**
 * Build graphs from documents and serialize them back
 */

import { Compound } from '../operations/compound.js';
import type { Operation } from '../operations/operation.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { InputSocket } from '../sockets/input-socket.js';
import type { OutputSocket } from '../sockets/output-socket.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import {
  GRAPH_DOCUMENT_VERSION,
  type ConnectionDocument,
  type GraphDocument,
  type OperationDocument,
} from './graph-schema.js';

type CompoundBody = Pick<OperationDocument, 'operations' | 'connections' | 'inputs' | 'outputs'>;

function applyProperties(operation: Operation, properties: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(properties)) {
    try {
      operation.setProperty(name, value);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ConfigurationError(error.message);
      }
      throw error;
    }
  }
}

function createOperation(name: string, entry: OperationDocument, registry: OperationRegistry): Operation {
  if (entry.type === Compound.TYPE) {
    const compound = new Compound(name);
    populateCompound(compound, entry, registry);
    applyProperties(compound, entry.properties ?? {});
    return compound;
  }

  const operation = registry.create(entry.type, name);
  if (entry.operations || entry.connections || entry.inputs || entry.outputs) {
    throw new ConfigurationError(`${name} is a ${entry.type} and cannot contain operations`);
  }
  applyProperties(operation, entry.properties ?? {});
  return operation;
}

/**
 * Add the operations, connections and exposed ports a document describes
 * to `compound`
 *
 * @throws ConfigurationError for unknown types, bad property values or
 *   socket paths that do not resolve
 */
export function populateCompound(compound: Compound, body: CompoundBody, registry: OperationRegistry): void {
  for (const [name, entry] of Object.entries(body.operations ?? {})) {
    compound.addOperation(createOperation(name, entry, registry));
  }
  for (const connection of body.connections ?? []) {
    for (const input of connection.inputs) {
      compound.connect(connection.output, input);
    }
  }
  for (const [port, path] of Object.entries(body.inputs ?? {})) {
    compound.exposeInput(port, path);
  }
  for (const [port, path] of Object.entries(body.outputs ?? {})) {
    compound.exposeOutput(port, path);
  }
}

/**
 * A validated document as a new root compound
 */
export function buildGraph(name: string, document: GraphDocument, registry: OperationRegistry): Compound {
  const root = new Compound(name);
  populateCompound(root, document, registry);
  return root;
}

/**
 * Path of `socket` relative to `scope`, preferring the port a child
 * publishes over a path into its descendants
 */
function socketPath(scope: Compound, socket: InputSocket | OutputSocket): string | undefined {
  for (const child of scope.children()) {
    if (!child.owns(socket.owner)) {
      continue;
    }
    const port = child.portOf(socket);
    if (port !== undefined) {
      return `${child.name}.${port}`;
    }
    if (child instanceof Compound) {
      const inner = socketPath(child, socket);
      return inner === undefined ? undefined : `${child.name}.${inner}`;
    }
    return undefined;
  }
  return undefined;
}

/**
 * Connections whose lowest common container is `scope`
 */
function connectionsOf(scope: Compound): ConnectionDocument[] {
  const members = scope.children();
  const ownerIndex = (socket: InputSocket | OutputSocket): number =>
    members.findIndex((member) => member.owns(socket.owner));

  const documents: ConnectionDocument[] = [];
  for (const output of scope.allOutputs()) {
    const from = ownerIndex(output);
    const inputs: string[] = [];
    for (const input of output.connections) {
      const to = ownerIndex(input);
      if (to === -1 || (to === from && members[to] instanceof Compound)) {
        continue;
      }
      const path = socketPath(scope, input);
      if (path !== undefined) {
        inputs.push(path);
      }
    }
    const outputPath = socketPath(scope, output);
    if (inputs.length > 0 && outputPath !== undefined) {
      documents.push({ output: outputPath, inputs });
    }
  }
  return documents;
}

function exposures(scope: Compound, ports: Array<[string, InputSocket | OutputSocket]>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [port, socket] of ports) {
    const path = socketPath(scope, socket);
    if (path !== undefined) {
      record[port] = path;
    }
  }
  return record;
}

function serializeBody(scope: Compound): Required<CompoundBody> {
  const operations: Record<string, OperationDocument> = {};
  for (const child of scope.children()) {
    operations[child.name] =
      child instanceof Compound
        ? { type: child.type, ...serializeBody(child) }
        : { type: child.type, properties: child.propertyValues() };
  }
  return {
    operations,
    connections: connectionsOf(scope),
    inputs: exposures(scope, scope.inputPorts()),
    outputs: exposures(scope, scope.outputPorts()),
  };
}

/**
 * Topology and property values of `root`, in the form buildGraph() reads
 */
export function serializeGraph(root: Compound): GraphDocument {
  return { version: GRAPH_DOCUMENT_VERSION, ...serializeBody(root) };
}
