import { ProcessingMode } from '../types/operation.types.js';
import type { Processor, ProcessorHost } from './types.js';

/**
 * Runs an operation's steps on the task that delivered its input.
 *
 * A delivery that arrives while this processor is already draining, from a
 * re-entrant emission or from another producer, only marks work as pending.
 * The active drain loop picks it up before it returns, so a producer never
 * waits on a busy consumer.
 */
export class SynchronousProcessor implements Processor {
  readonly mode = ProcessingMode.SYNCHRONOUS;

  private running = false;
  private draining = false;
  private pending = false;

  constructor(private readonly host: ProcessorHost) {}

  get active(): boolean {
    return this.running;
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
    this.pending = false;
  }

  async notify(): Promise<void> {
    if (!this.running) {
      return;
    }
    if (this.draining) {
      this.pending = true;
      return;
    }

    this.draining = true;
    try {
      do {
        this.pending = false;
        while (this.running && (await this.host.processNext())) {
          // keep stepping while input is ready
        }
      } while (this.running && this.pending);
    } finally {
      this.draining = false;
    }
  }
}
