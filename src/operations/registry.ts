/**
 * Operation Registry
 *
 * Maps operation type names to factories, so that graphs can be built and
 * loaded by type name.
 */

import type { Operation } from './operation.js';
import { ConfigurationError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'operation-registry' });

export type OperationFactory = (name: string) => Operation;

export interface OperationTypeInfo {
  type: string;
  description: string;
}

interface RegistryEntry {
  factory: OperationFactory;
  description: string;
}

/**
 * OperationRegistry - Manages operation factories
 */
export class OperationRegistry {
  private entries = new Map<string, RegistryEntry>();

  /**
   * Register a factory under a type name
   */
  register(type: string, factory: OperationFactory, description = ''): void {
    if (this.entries.has(type)) {
      logger.warn({ type }, 'Overwriting existing operation type');
    }
    this.entries.set(type, { factory, description });
    logger.debug({ type }, 'Operation type registered');
  }

  get(type: string): OperationFactory | undefined {
    return this.entries.get(type)?.factory;
  }

  /**
   * @throws ConfigurationError if the type is not registered
   */
  getOrThrow(type: string): OperationFactory {
    const factory = this.get(type);
    if (!factory) {
      throw new ConfigurationError(`Unknown operation type '${type}'`);
    }
    return factory;
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  getTypes(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Create a new operation of a registered type
   *
   * @throws ConfigurationError if the type is not registered or the
   *   factory returns an operation of another type
   */
  create(type: string, name: string): Operation {
    const operation = this.getOrThrow(type)(name);
    if (operation.type !== type) {
      throw new ConfigurationError(`Factory for '${type}' created an operation of type '${operation.type}'`);
    }
    return operation;
  }

  clear(): void {
    this.entries.clear();
  }

  summary(): OperationTypeInfo[] {
    return Array.from(this.entries, ([type, entry]) => ({ type, description: entry.description }));
  }
}
