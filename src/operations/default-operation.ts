/**
 * DefaultOperation
 *
 * Base class for leaf operations. Owns a fixed socket set, a flow controller
 * built by check() and a processor that drives processing steps. Subclasses
 * declare sockets and properties in their constructor and implement
 * process().
 *
 * A run emits sync-start on every output before any data and ends with
 * sync-end followed by stop. Pause, resume and stop requests take effect
 * through the tags flowing in from upstream; a source emits its own tags
 * right after the step in flight.
 */

import { z } from 'zod';
import { FlowController } from '../flow/flow-controller.js';
import { InputSet, type FlowStep, type SyncTag } from '../flow/types.js';
import { InputSocket } from '../sockets/input-socket.js';
import { OutputSocket } from '../sockets/output-socket.js';
import type { InputSocketOptions, OutputSocketOptions, SocketOwner } from '../sockets/types.js';
import { createProcessor, type Processor } from '../processors/index.js';
import {
  OperationState,
  ProcessingMode,
  type OperationFailure,
  type OperationStatistics,
} from '../types/operation.types.js';
import { ControlTag, type DataVariant } from '../types/variant.types.js';
import { controlVariant } from '../variant/variant.js';
import { getConfig } from '../config/index.js';
import { ConfigurationError, toFlowError } from '../utils/errors.js';
import { Operation } from './operation.js';

export interface DefaultOperationOptions {
  /** Initial processing mode (default: synchronous) */
  processingMode?: ProcessingMode;
}

/** States in which queued input is consumed */
const CONSUMING_STATES: ReadonlySet<OperationState> = new Set([
  OperationState.RUNNING,
  OperationState.PAUSING,
  OperationState.PAUSED,
  OperationState.STOPPING,
]);

function emptyStatistics(): OperationStatistics {
  return { steps: 0, totalStepMs: 0, maxStepMs: 0, discardedItems: 0 };
}

export abstract class DefaultOperation extends Operation implements SocketOwner {
  private readonly inputSockets: InputSocket[] = [];
  private readonly outputSockets: OutputSocket[] = [];
  private processingMode: ProcessingMode;
  private processor: Processor;
  private controller: FlowController | undefined;
  private source = false;
  private _checked = false;
  private stepping = false;
  /** Request made while starting or pausing, applied once that transition ends */
  private deferred: OperationState | undefined;
  private stats: OperationStatistics = emptyStatistics();
  private failure: OperationFailure | undefined;
  private readonly slowStepMs: number;

  constructor(name: string, options: DefaultOperationOptions = {}) {
    super(name);
    this.processingMode = options.processingMode ?? ProcessingMode.SYNCHRONOUS;
    this.processor = createProcessor(this.processingMode, this);
    this.slowStepMs = getConfig().engine.slowStepMs;

    this.properties.define('processingMode', {
      schema: z.nativeEnum(ProcessingMode),
      get: () => this.processingMode,
      set: (mode) => {
        if (mode === this.processingMode) {
          return;
        }
        if (this.state !== OperationState.STOPPED) {
          throw new ConfigurationError(`Cannot change the processing mode of ${this.path} while ${this.state}`);
        }
        this.processingMode = mode;
        this._checked = false;
      },
      description: 'threaded or synchronous',
    });
  }

  get inputs(): readonly InputSocket[] {
    return this.inputSockets;
  }

  get outputs(): readonly OutputSocket[] {
    return this.outputSockets;
  }

  get checked(): boolean {
    return this._checked;
  }

  get lastError(): OperationFailure | undefined {
    return this.failure;
  }

  get statistics(): OperationStatistics {
    return {
      ...this.stats,
      discardedItems: this.stats.discardedItems + (this.controller?.discardedItems ?? 0),
    };
  }

  /** True when check() found no connected inputs */
  get isSource(): boolean {
    return this.source;
  }

  get mode(): ProcessingMode {
    return this.processingMode;
  }

  owns(owner: SocketOwner): boolean {
    return owner === this;
  }

  allInputs(): InputSocket[] {
    return [...this.inputSockets];
  }

  allOutputs(): OutputSocket[] {
    return [...this.outputSockets];
  }

  protected addInput(name: string, options: InputSocketOptions = {}): InputSocket {
    this.assertUniqueSocket(name);
    const socket = new InputSocket(this, name, {
      ...options,
      capacity: options.capacity ?? getConfig().sockets.queueCapacity,
    });
    this.inputSockets.push(socket);
    return socket;
  }

  protected addOutput(name: string, options: OutputSocketOptions = {}): OutputSocket {
    this.assertUniqueSocket(name);
    const socket = new OutputSocket(this, name, options);
    this.outputSockets.push(socket);
    return socket;
  }

  private assertUniqueSocket(name: string): void {
    if (this.input(name) || this.output(name)) {
      throw new ConfigurationError(`Socket '${name}' is already defined on ${this.path}`);
    }
  }

  /**
   * Send a data item downstream
   */
  protected async emit(output: string | OutputSocket, item: DataVariant): Promise<void> {
    const socket = typeof output === 'string' ? this.resolveOutput(output) : output;
    await socket.emit(item);
  }

  /**
   * One processing step over the items the flow controller collected.
   * Sources receive an empty set.
   */
  protected abstract process(inputs: InputSet): Promise<void> | void;

  /** Reset accumulated state, called by check(true) */
  protected reset(): void {}

  /** A sync-start or sync-end tag was consumed on a group */
  protected syncEvent(_tag: SyncTag, _groupId: number): void {}

  /** Any control tag was consumed on a group */
  protected controlReceived(_tag: ControlTag, _groupId: number): void {}

  check(reset: boolean): void {
    if (this.state !== OperationState.STOPPED && this.state !== OperationState.INTERRUPTED) {
      throw new ConfigurationError(`Cannot check ${this.path} while ${this.state}`);
    }

    for (const socket of this.inputSockets) {
      if (!socket.optional && !socket.isConnected()) {
        throw new ConfigurationError(`Required input ${socket.path} is not connected`);
      }
    }

    const connected = this.inputSockets.filter((socket) => socket.isConnected());
    const controller = new FlowController(connected, {
      onControl: (tag, groupId) => this.controlReceived(tag, groupId),
    });
    if (connected.length === 0 && this.processingMode === ProcessingMode.SYNCHRONOUS) {
      throw new ConfigurationError(`${this.path} has no connected inputs and cannot run synchronously`);
    }

    if (this.processor.active) {
      this.processor.stop();
    }
    if (this.processor.mode !== this.processingMode) {
      this.processor = createProcessor(this.processingMode, this);
    }

    if (reset) {
      this.stats = emptyStatistics();
      this.reset();
    } else if (this.controller) {
      this.stats.discardedItems += this.controller.discardedItems;
    }

    this.controller = controller;
    this.source = connected.length === 0;
    this.failure = undefined;
    this.clearInputs();
    this._checked = true;
    this.setState(OperationState.STOPPED);
  }

  start(): void {
    switch (this.state) {
      case OperationState.STOPPED:
        if (!this._checked || !this.controller) {
          throw new ConfigurationError(`${this.path} must be checked before it is started`);
        }
        this.controller.reset();
        this.clearInputs();
        this.failure = undefined;
        this.deferred = undefined;
        this.setState(OperationState.STARTING);
        this.processor.start();
        this.beginRun().catch((error: unknown) => this.fail(error));
        break;
      case OperationState.PAUSED:
        // Operations with inputs resume when resume tags arrive
        if (this.source) {
          this.setState(OperationState.STARTING);
          this.resumeRun().catch((error: unknown) => this.fail(error));
        }
        break;
      case OperationState.PAUSING:
        // The pause tag may already be on its way; resume right after it
        if (this.source) {
          this.deferred = OperationState.RUNNING;
        }
        break;
      case OperationState.INTERRUPTED:
        throw new ConfigurationError(`${this.path} was interrupted and must be checked before it is started`);
      default:
        break;
    }
  }

  pause(): void {
    switch (this.state) {
      case OperationState.STARTING:
        this.deferred = OperationState.PAUSING;
        break;
      case OperationState.RUNNING:
        this.setState(OperationState.PAUSING);
        this.wakeSource();
        break;
      case OperationState.PAUSING:
        if (this.deferred === OperationState.RUNNING) {
          this.deferred = undefined;
        }
        break;
      default:
        break;
    }
  }

  stop(): void {
    switch (this.state) {
      case OperationState.STARTING:
        this.deferred = OperationState.STOPPING;
        break;
      case OperationState.RUNNING:
      case OperationState.PAUSING:
      case OperationState.PAUSED:
        this.deferred = undefined;
        this.setState(OperationState.STOPPING);
        this.wakeSource();
        break;
      default:
        break;
    }
  }

  /**
   * Abort at once. A step in flight finishes on its own but nothing is
   * scheduled after it.
   */
  interrupt(): void {
    if (this.state === OperationState.STOPPED || this.state === OperationState.INTERRUPTED) {
      return;
    }
    this.deferred = undefined;
    this.setState(OperationState.INTERRUPTED);
    this.clearInputs();
    this.processor.stop();
  }

  topologyChanged(): void {
    this._checked = false;
  }

  inputReady(_socket: InputSocket): Promise<void> {
    return this.processor.notify();
  }

  /**
   * Run at most one step. Failures are captured here and end the run, so
   * the returned promise never rejects.
   */
  async processNext(): Promise<boolean> {
    if (this.stepping || !this.controller) {
      return false;
    }
    this.stepping = true;
    try {
      if (this.source) {
        return await this.sourceStep();
      }
      if (!CONSUMING_STATES.has(this.state)) {
        return false;
      }
      return await this.handleStep(this.controller.prepareProcess());
    } catch (error) {
      await this.fail(error);
      return false;
    } finally {
      this.stepping = false;
    }
  }

  private async sourceStep(): Promise<boolean> {
    switch (this.state) {
      case OperationState.RUNNING:
        await this.runProcess(new InputSet(0));
        return true;
      case OperationState.PAUSING:
        await this.emitControl(ControlTag.PAUSE);
        if (this.state !== OperationState.PAUSING) {
          return true;
        }
        if (this.deferred === OperationState.RUNNING) {
          this.deferred = undefined;
          this.setState(OperationState.STARTING);
          await this.resumeRun();
        } else {
          this.setState(OperationState.PAUSED);
        }
        return true;
      case OperationState.STOPPING:
        await this.finishRun();
        return true;
      default:
        return false;
    }
  }

  private async handleStep(step: FlowStep): Promise<boolean> {
    switch (step.kind) {
      case 'incomplete':
        return false;
      case 'data':
        await this.runProcess(step.inputs);
        return true;
      case 'sync':
        this.syncEvent(step.tag, step.groupId);
        return true;
      case 'control':
        return true;
      case 'pause':
        if (this.state === OperationState.RUNNING) {
          this.setState(OperationState.PAUSING);
        }
        await this.emitControl(ControlTag.PAUSE);
        if (this.state === OperationState.PAUSING) {
          this.setState(OperationState.PAUSED);
        }
        return true;
      case 'resume':
        if (this.state === OperationState.PAUSED) {
          this.setState(OperationState.STARTING);
        }
        await this.emitControl(ControlTag.RESUME);
        if (this.state === OperationState.STARTING) {
          this.setState(OperationState.RUNNING);
        }
        return true;
      case 'finished':
        await this.finishRun();
        return true;
    }
  }

  private async runProcess(inputs: InputSet): Promise<void> {
    const started = performance.now();
    await this.process(inputs);
    const elapsed = performance.now() - started;

    this.stats.steps++;
    this.stats.totalStepMs += elapsed;
    this.stats.maxStepMs = Math.max(this.stats.maxStepMs, elapsed);
    if (elapsed > this.slowStepMs) {
      this.logger.warn({ durationMs: Math.round(elapsed) }, 'Slow processing step');
    }
  }

  private async beginRun(): Promise<void> {
    // Let every sibling started in the same call enter Starting first
    await Promise.resolve();
    if (this.state !== OperationState.STARTING) {
      return;
    }

    await this.emitControl(ControlTag.SYNC_START);
    if (this.state !== OperationState.STARTING) {
      return;
    }
    this.setState(OperationState.RUNNING);
    this.applyDeferred();
    await this.processor.notify();
  }

  private async resumeRun(): Promise<void> {
    await Promise.resolve();
    if (this.state !== OperationState.STARTING) {
      return;
    }

    await this.emitControl(ControlTag.RESUME);
    if (this.state !== OperationState.STARTING) {
      return;
    }
    this.setState(OperationState.RUNNING);
    this.applyDeferred();
    await this.processor.notify();
  }

  private applyDeferred(): void {
    const request = this.deferred;
    this.deferred = undefined;
    if (request === OperationState.PAUSING) {
      this.pause();
    } else if (request === OperationState.STOPPING) {
      this.stop();
    }
  }

  private async finishRun(): Promise<void> {
    if (this.state !== OperationState.STOPPING) {
      this.setState(OperationState.STOPPING);
    }
    await this.emitControl(ControlTag.SYNC_END);
    await this.emitControl(ControlTag.STOP);
    if (this.state === OperationState.STOPPING) {
      this.processor.stop();
      this.setState(OperationState.STOPPED);
    }
  }

  /**
   * End the run after a failed step: report, drop queued input and let
   * downstream operations finish.
   */
  private async fail(error: unknown): Promise<void> {
    const failure: OperationFailure = { operation: this.path, error: toFlowError(error) };
    this.failure = failure;

    if (this.state === OperationState.INTERRUPTED) {
      this.logger.warn({ err: failure.error }, 'Processing step failed after interrupt');
      return;
    }

    this.logger.error({ err: failure.error, code: failure.error.code }, 'Processing step failed');
    this.reportError(failure);

    if (this.state === OperationState.STOPPED || this.state === OperationState.INTERRUPTED) {
      return;
    }
    this.deferred = undefined;
    this.setState(OperationState.STOPPING);
    this.clearInputs();
    await this.finishRun();
  }

  private async emitControl(tag: ControlTag): Promise<void> {
    const item = controlVariant(tag);
    for (const socket of this.outputSockets) {
      await socket.emit(item);
    }
  }

  /** Sources emit their own pause and stop tags from the processing loop */
  private wakeSource(): void {
    if (!this.source) {
      return;
    }
    this.processor.notify().catch((error: unknown) => {
      this.logger.error({ err: error }, 'Wake-up failed');
    });
  }

  private clearInputs(): void {
    for (const socket of this.inputSockets) {
      socket.clear();
    }
  }
}
