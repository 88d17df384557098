import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ProcessingMode } from '../types/operation.types.js';
import { Signal } from '../utils/signal.js';
import { createChildLogger } from '../utils/logger.js';
import type { Processor, ProcessorHost } from './types.js';

const logger = createChildLogger({ service: 'threaded-processor' });

/**
 * Runs an operation on its own async loop.
 *
 * The loop steps while the host makes progress and otherwise waits for a
 * notification. Sources yield to the event loop after every step so that
 * they never starve the rest of the graph.
 */
export class ThreadedProcessor implements Processor {
  readonly mode = ProcessingMode.THREADED;

  private readonly signal = new Signal();
  private generation = 0;
  private running = false;
  private loop: Promise<void> | undefined;

  constructor(private readonly host: ProcessorHost) {}

  get active(): boolean {
    return this.running;
  }

  /** Settles when the current loop has exited */
  get idle(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.signal.reset();
    const generation = ++this.generation;
    this.loop = this.run(generation).catch((error: unknown) => {
      logger.error({ err: error, operation: this.host.name }, 'Processing loop failed');
    });
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.generation++;
    this.signal.notify();
  }

  notify(): Promise<void> {
    this.signal.notify();
    return Promise.resolve();
  }

  private async run(generation: number): Promise<void> {
    logger.trace({ operation: this.host.name }, 'Processing loop started');

    while (this.generation === generation) {
      const progressed = await this.host.processNext();
      if (this.generation !== generation) {
        break;
      }
      if (!progressed) {
        await this.signal.wait();
      } else if (this.host.isSource) {
        await yieldToEventLoop();
      }
    }

    logger.trace({ operation: this.host.name }, 'Processing loop exited');
  }
}
