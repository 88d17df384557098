/**
 * Configure-by-name property tables
 *
 * Each operation registers its settings with a zod schema and typed
 * accessors. Values set by name are validated before they reach the
 * operation.
 */

import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../utils/errors.js';

export interface PropertyDefinition<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  get: () => T;
  set: (value: T) => void;
  description?: string;
}

interface PropertyEntry {
  description?: string;
  read: () => unknown;
  write: (value: unknown) => void;
}

export interface PropertyInfo {
  name: string;
  description?: string;
  value: unknown;
}

export class PropertyTable {
  private readonly entries = new Map<string, PropertyEntry>();

  /**
   * @param owner - Operation name used in error messages
   */
  constructor(private readonly owner: () => string) {}

  define<T>(name: string, definition: PropertyDefinition<T>): this {
    if (this.entries.has(name)) {
      throw new ConfigurationError(`Property '${name}' is already defined on ${this.owner()}`);
    }
    this.entries.set(name, {
      description: definition.description,
      read: definition.get,
      write: (value) => {
        const result = definition.schema.safeParse(value);
        if (!result.success) {
          const reason = result.error.issues.map((issue) => issue.message).join('; ');
          throw new ValidationError(
            `Invalid value for ${this.owner()}.${name}: ${reason}`,
            result.error.flatten()
          );
        }
        definition.set(result.data);
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): unknown {
    return this.entry(name).read();
  }

  /**
   * @throws ConfigurationError for unknown names, ValidationError for bad values
   */
  set(name: string, value: unknown): void {
    this.entry(name).write(value);
  }

  /**
   * Set several properties, in key order
   */
  assign(values: Record<string, unknown>): void {
    for (const [name, value] of Object.entries(values)) {
      this.set(name, value);
    }
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  describe(): PropertyInfo[] {
    return [...this.entries].map(([name, entry]) => ({
      name,
      description: entry.description,
      value: entry.read(),
    }));
  }

  toRecord(): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const [name, entry] of this.entries) {
      record[name] = entry.read();
    }
    return record;
  }

  private entry(name: string): PropertyEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ConfigurationError(`Unknown property '${name}' on ${this.owner()}`);
    }
    return entry;
  }
}
