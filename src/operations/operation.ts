/**
 * Operation
 *
 * Common surface of every graph node: lifecycle state, observers,
 * configure-by-name properties and socket lookup. Leaf operations extend
 * DefaultOperation; Compound composes other operations.
 */

import type { InputSocket } from '../sockets/input-socket.js';
import type { OutputSocket } from '../sockets/output-socket.js';
import type { SocketOwner } from '../sockets/types.js';
import {
  OperationState,
  type ErrorListener,
  type OperationFailure,
  type OperationStatistics,
  type StateListener,
} from '../types/operation.types.js';
import { ConfigurationError } from '../utils/errors.js';
import { createChildLogger, type Logger } from '../utils/logger.js';
import { PropertyTable } from './properties.js';

export abstract class Operation {
  /** Registered type name, used when saving a graph */
  abstract readonly type: string;

  /** Containing compound, if any */
  parent: Operation | undefined;

  protected readonly properties: PropertyTable;
  protected readonly logger: Logger;

  private readonly _name: string;
  private _state: OperationState = OperationState.STOPPED;
  private readonly stateListeners = new Set<StateListener>();
  private readonly errorListeners = new Set<ErrorListener>();

  constructor(name: string) {
    if (!/^[A-Za-z_][\w-]*$/.test(name)) {
      throw new ConfigurationError(`Invalid operation name '${name}'`);
    }
    this._name = name;
    this.properties = new PropertyTable(() => this.path);
    this.logger = createChildLogger({ service: 'operation', operation: name });
  }

  get name(): string {
    return this._name;
  }

  /**
   * Dotted name relative to the outermost compound, the form connect()
   * accepts there
   */
  get path(): string {
    if (!this.parent?.parent) {
      return this._name;
    }
    return `${this.parent.path}.${this._name}`;
  }

  get state(): OperationState {
    return this._state;
  }

  abstract get inputs(): readonly InputSocket[];
  abstract get outputs(): readonly OutputSocket[];

  /** True once check() has succeeded and nothing invalidated it since */
  abstract get checked(): boolean;

  /** Failure that ended the last run, if any */
  abstract get lastError(): OperationFailure | undefined;

  abstract get statistics(): OperationStatistics;

  /**
   * Validate configuration and prepare a run.
   *
   * @param reset - also reset accumulated state such as statistics
   * @throws ConfigurationError
   */
  abstract check(reset: boolean): void;
  abstract start(): void;
  abstract pause(): void;
  abstract stop(): void;
  abstract interrupt(): void;

  /** True when `owner` is this operation or one of its descendants */
  abstract owns(owner: SocketOwner): boolean;

  /** Every output socket of this operation and its descendants */
  abstract allOutputs(): OutputSocket[];

  /** Every input socket of this operation and its descendants */
  abstract allInputs(): InputSocket[];

  /** Input sockets keyed by the port name this operation publishes them under */
  inputPorts(): Array<[string, InputSocket]> {
    return this.inputs.map((socket) => [socket.name, socket]);
  }

  outputPorts(): Array<[string, OutputSocket]> {
    return this.outputs.map((socket) => [socket.name, socket]);
  }

  input(name: string): InputSocket | undefined {
    return this.inputPorts().find(([port]) => port === name)?.[1];
  }

  output(name: string): OutputSocket | undefined {
    return this.outputPorts().find(([port]) => port === name)?.[1];
  }

  /** Port name of one of this operation's own sockets */
  portOf(socket: InputSocket | OutputSocket): string | undefined {
    const ports: Array<[string, InputSocket | OutputSocket]> =
      socket.direction === 'input' ? this.inputPorts() : this.outputPorts();
    return ports.find(([, candidate]) => candidate === socket)?.[0];
  }

  /**
   * Find an input by dotted path relative to this operation
   *
   * @throws ConfigurationError when the path does not name an input
   */
  resolveInput(path: string): InputSocket {
    const socket = this.input(path);
    if (!socket) {
      throw new ConfigurationError(`No input '${path}' in ${this.path}`);
    }
    return socket;
  }

  /**
   * @throws ConfigurationError when the path does not name an output
   */
  resolveOutput(path: string): OutputSocket {
    const socket = this.output(path);
    if (!socket) {
      throw new ConfigurationError(`No output '${path}' in ${this.path}`);
    }
    return socket;
  }

  setProperty(name: string, value: unknown): void {
    this.properties.set(name, value);
  }

  property(name: string): unknown {
    return this.properties.get(name);
  }

  propertyNames(): string[] {
    return this.properties.names();
  }

  /** Current property values, as saved with a graph */
  propertyValues(): Record<string, unknown> {
    return this.properties.toRecord();
  }

  /**
   * Observe state transitions. Listeners run synchronously.
   * @returns a function that removes the listener
   */
  onStateChanged(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  /**
   * Observe failures of this operation (or, for a compound, its children)
   * @returns a function that removes the listener
   */
  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  /**
   * Wait until the state is one of `target`
   *
   * @param timeoutMs - give up after this long; waits forever when omitted
   * @returns false on timeout
   */
  wait(target: OperationState | readonly OperationState[], timeoutMs?: number): Promise<boolean> {
    const targets: readonly OperationState[] = typeof target === 'string' ? [target] : target;
    if (targets.includes(this._state)) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const unsubscribe = this.onStateChanged((state) => {
        if (targets.includes(state)) {
          clearTimeout(timer);
          unsubscribe();
          resolve(true);
        }
      });
      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
          unsubscribe();
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  /** Called when a connection to one of this operation's sockets changes */
  abstract topologyChanged(): void;

  protected setState(next: OperationState): void {
    const previous = this._state;
    if (previous === next) {
      return;
    }
    this.willChangeState(next);
    this._state = next;
    this.logger.trace({ from: previous, to: next }, 'State changed');

    for (const listener of [...this.stateListeners]) {
      try {
        listener(next, previous, this._name);
      } catch (error) {
        this.logger.error({ err: error }, 'State listener failed');
      }
    }
  }

  /**
   * Hook called before each state transition
   */
  protected willChangeState(_next: OperationState): void {}

  protected reportError(failure: OperationFailure): void {
    for (const listener of [...this.errorListeners]) {
      try {
        listener(failure);
      } catch (error) {
        this.logger.error({ err: error }, 'Error listener failed');
      }
    }
  }
}
