import type { ControlTag, DataVariant } from '../types/variant.types.js';
import { ExecutionError } from '../utils/errors.js';

/**
 * Flow controller strategies, chosen by the number of connected inputs
 */
export const FlowControllerKind = {
  SOURCE: 'source',
  ONE_INPUT: 'one-input',
  MULTI_GROUP: 'multi-group',
} as const;

export type FlowControllerKind = (typeof FlowControllerKind)[keyof typeof FlowControllerKind];

/** Per-group control state */
export type GroupState = 'open' | 'paused' | 'stopped';

export type SyncTag = typeof ControlTag.SYNC_START | typeof ControlTag.SYNC_END;

/**
 * The items one processing step reads, keyed by input socket name
 */
export class InputSet {
  readonly groupId: number;
  private readonly items = new Map<string, DataVariant>();

  constructor(groupId: number, items?: Iterable<[string, DataVariant]>) {
    this.groupId = groupId;
    for (const [name, item] of items ?? []) {
      this.items.set(name, item);
    }
  }

  /** @internal */
  set(name: string, item: DataVariant): void {
    this.items.set(name, item);
  }

  get(name: string): DataVariant | undefined {
    return this.items.get(name);
  }

  /**
   * Item read from `name`, throwing when the input did not take part
   */
  require(name: string): DataVariant {
    const item = this.items.get(name);
    if (!item) {
      throw new ExecutionError(`No item read from input '${name}'`);
    }
    return item;
  }

  has(name: string): boolean {
    return this.items.has(name);
  }

  /** First item of the set, in socket order */
  first(): DataVariant | undefined {
    for (const item of this.items.values()) {
      return item;
    }
    return undefined;
  }

  get names(): string[] {
    return [...this.items.keys()];
  }

  get size(): number {
    return this.items.size;
  }
}

/**
 * Outcome of one readiness evaluation
 */
export type FlowStep =
  | { kind: 'incomplete' }
  | { kind: 'data'; groupId: number; inputs: InputSet }
  | { kind: 'sync'; groupId: number; tag: SyncTag }
  | { kind: 'control'; groupId: number; tag: ControlTag }
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'finished' };

export type FlowStepKind = FlowStep['kind'];
