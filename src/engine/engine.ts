/**
 * Engine
 *
 * Owns the root compound and runs it: check, start, wait for the graph to
 * finish and fold whatever failed into one result.
 */

import { randomUUID } from 'node:crypto';
import { Compound } from '../operations/compound.js';
import type { Operation } from '../operations/operation.js';
import { OperationState } from '../types/operation.types.js';
import {
  ConfigurationError,
  ExecutionError,
  ExecutionTimeoutError,
  ValidationError,
  toFlowError,
  type FlowError,
} from '../utils/errors.js';
import { ExecutionTimer, type ExecutionSummary } from '../utils/timer.js';
import { createEngineContext, type EngineContext } from './context.js';
import { buildGraph, serializeGraph } from './graph-io.js';
import { graphDocumentSchema, type GraphDocument } from './graph-schema.js';

export const ROOT_NAME = 'root';

const FINISHED_STATES = [OperationState.STOPPED, OperationState.INTERRUPTED] as const;

export interface ExecuteOptions {
  /** Interrupt the graph after this long; 0 waits forever (default: from config) */
  timeoutMs?: number;
}

export type ExecutionResult =
  | {
      success: true;
      durationMs: number;
      summary: ExecutionSummary;
    }
  | {
      success: false;
      /** Name of the operation that failed first */
      operation: string;
      error: FlowError;
      message: string;
      durationMs: number;
      summary: ExecutionSummary;
    };

export class Engine {
  readonly context: EngineContext;
  private _root: Compound;
  private unsubscribe: () => void;
  private disposed = false;

  constructor(context: EngineContext = createEngineContext()) {
    this.context = context;
    this._root = new Compound(ROOT_NAME);
    this.unsubscribe = this.observe(this._root);
  }

  get root(): Compound {
    return this._root;
  }

  get state(): OperationState {
    return this._root.state;
  }

  /**
   * Create an operation of a registered type in the root compound
   */
  createOperation(type: string, name: string): Operation {
    const operation =
      type === Compound.TYPE ? new Compound(name) : this.context.registry.create(type, name);
    return this._root.addOperation(operation);
  }

  /**
   * Run the graph to completion. Graph errors are reported in the result,
   * never thrown.
   */
  async execute(options: ExecuteOptions = {}): Promise<ExecutionResult> {
    this.assertUsable();
    const { logger, config } = this.context;
    const timeoutMs = options.timeoutMs ?? config.engine.executeTimeoutMs;
    const runId = randomUUID();
    const timer = new ExecutionTimer(runId, { logger, slowThresholdMs: config.engine.slowStepMs });
    const started = Date.now();

    logger.info({ runId, operations: this._root.children().length, timeoutMs }, 'Execution started');

    timer.startPhase('check');
    try {
      this._root.check(true);
    } catch (error) {
      return this.finish(timer, started, { operation: this._root.name, error: toFlowError(error) });
    }

    if (this._root.children().length === 0) {
      return this.finish(timer, started);
    }

    timer.startPhase('run');
    try {
      this._root.start();
    } catch (error) {
      return this.finish(timer, started, { operation: this._root.name, error: toFlowError(error) });
    }

    const finished = await this._root.wait(FINISHED_STATES, timeoutMs);
    if (!finished) {
      logger.warn({ runId, timeoutMs }, 'Execution timed out, interrupting');
      this._root.interrupt();
      return this.finish(timer, started, {
        operation: this._root.name,
        error: new ExecutionTimeoutError(timeoutMs),
      });
    }

    const failure = this._root.lastError;
    if (failure) {
      return this.finish(timer, started, failure);
    }
    if (this._root.state === OperationState.INTERRUPTED) {
      return this.finish(timer, started, {
        operation: this._root.name,
        error: new ExecutionError('Execution was interrupted'),
      });
    }
    return this.finish(timer, started);
  }

  start(): void {
    this.assertUsable();
    this._root.start();
  }

  pause(): void {
    this._root.pause();
  }

  stop(): void {
    this._root.stop();
  }

  interrupt(): void {
    this._root.interrupt();
  }

  wait(target: OperationState | readonly OperationState[], timeoutMs?: number): Promise<boolean> {
    return this._root.wait(target, timeoutMs);
  }

  /**
   * Replace the current graph with one read from a document
   *
   * @throws ValidationError when the document is malformed
   * @throws ConfigurationError when it names unknown types, bad property
   *   values or sockets that do not exist, or the current graph is running
   */
  load(document: unknown): void {
    this.assertUsable();
    if (this._root.state !== OperationState.STOPPED && this._root.state !== OperationState.INTERRUPTED) {
      throw new ConfigurationError(`Cannot load a graph while the engine is ${this._root.state}`);
    }

    const result = graphDocumentSchema.safeParse(document);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid graph document: ${reason}`, result.error.flatten());
    }

    const root = buildGraph(ROOT_NAME, result.data, this.context.registry);
    this.unsubscribe();
    this._root = root;
    this.unsubscribe = this.observe(root);
    this.context.logger.info({ operations: root.children().length }, 'Graph loaded');
  }

  save(): GraphDocument {
    return serializeGraph(this._root);
  }

  /**
   * Interrupt the graph and stop observing it. The engine cannot be used
   * afterwards.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this._root.interrupt();
    this.unsubscribe();
    this.disposed = true;
  }

  private observe(root: Compound): () => void {
    const offError = root.onError((failure) => {
      this.context.logger.error(
        { operation: failure.operation, code: failure.error.code, err: failure.error },
        'Operation failed'
      );
    });
    const offState = root.onStateChanged((state, previous) => {
      this.context.logger.debug({ from: previous, to: state }, 'Graph state changed');
    });
    return () => {
      offError();
      offState();
    };
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new ConfigurationError('Engine has been disposed');
    }
  }

  private finish(
    timer: ExecutionTimer,
    started: number,
    failure?: { operation: string; error: FlowError }
  ): ExecutionResult {
    for (const operation of leaves(this._root)) {
      const stats = operation.statistics;
      timer.recordOperation(operation.path, stats.steps, stats.totalStepMs, stats.maxStepMs);
    }
    const summary = timer.logSummary();
    const durationMs = Date.now() - started;

    if (!failure) {
      return { success: true, durationMs, summary };
    }
    this.context.logger.error(
      { operation: failure.operation, code: failure.error.code, durationMs },
      `Execution failed: ${failure.error.message}`
    );
    return {
      success: false,
      operation: failure.operation,
      error: failure.error,
      message: failure.error.message,
      durationMs,
      summary,
    };
  }
}

function leaves(scope: Compound): Operation[] {
  return scope
    .children()
    .flatMap((child) => (child instanceof Compound ? leaves(child) : [child]));
}
