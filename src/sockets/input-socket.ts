import { ControlTag, type Variant } from '../types/variant.types.js';
import { OperationState } from '../types/operation.types.js';
import { controlVariant, isControlTag } from '../variant/variant.js';
import { ValidationError } from '../utils/errors.js';
import type { OutputSocket } from './output-socket.js';
import type { InputSocketOptions, SocketOwner } from './types.js';

/**
 * Merge state of one opening/closing tag pair across fan-in producers.
 * `closed` holds the producers whose latest tag of the pair was the
 * closing one.
 */
interface TagRound {
  open: boolean;
  readonly closed: Set<OutputSocket>;
}

function syncRound(): TagRound {
  return { open: false, closed: new Set() };
}

function pauseRound(): TagRound {
  return { open: true, closed: new Set() };
}

/**
 * Receiving end of a connection.
 *
 * Items from every connected output share one FIFO queue, so each producer's
 * own sequence is preserved. With more than one producer, control tags are
 * merged per producer: a pair such as pause/resume reaches the owner once
 * for the whole fan-in. Data items count against `capacity`; control
 * tags never wait for space.
 */
export class InputSocket {
  readonly direction = 'input' as const;
  readonly name: string;
  readonly owner: SocketOwner;
  readonly groupId: number;
  readonly optional: boolean;
  readonly feedback: boolean;

  private _capacity: number;
  private readonly sources: OutputSocket[] = [];
  private readonly queue: Variant[] = [];
  private dataCount = 0;
  private readonly spaceWaiters: Array<() => void> = [];
  private sync = syncRound();
  private pausing = pauseRound();
  private readonly stopped = new Set<OutputSocket>();

  constructor(owner: SocketOwner, name: string, options: InputSocketOptions = {}) {
    this.owner = owner;
    this.name = name;
    this.groupId = options.groupId ?? 0;
    this.optional = options.optional ?? false;
    this.feedback = options.feedback ?? false;
    this._capacity = InputSocket.validateCapacity(options.capacity ?? 0);
  }

  private static validateCapacity(capacity: number): number {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ValidationError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
    return capacity;
  }

  /** Owner-qualified name used in messages */
  get path(): string {
    return `${this.owner.name}.${this.name}`;
  }

  get capacity(): number {
    return this._capacity;
  }

  set capacity(capacity: number) {
    this._capacity = InputSocket.validateCapacity(capacity);
    this.releaseSpace(this.spaceWaiters.length);
  }

  get connections(): readonly OutputSocket[] {
    return this.sources;
  }

  isConnected(): boolean {
    return this.sources.length > 0;
  }

  /** Number of queued items, control tags included */
  get queueLength(): number {
    return this.queue.length;
  }

  peek(index = 0): Variant | undefined {
    return this.queue[index];
  }

  /**
   * Remove and return the oldest queued item
   */
  shift(): Variant | undefined {
    const item = this.queue.shift();
    if (item && !isControlTag(item)) {
      this.dataCount--;
      this.releaseSpace(1);
    }
    return item;
  }

  /**
   * Drop everything queued and release producers waiting for space
   */
  clear(): void {
    this.queue.length = 0;
    this.dataCount = 0;
    this.sync = syncRound();
    this.pausing = pauseRound();
    this.stopped.clear();
    this.releaseSpace(this.spaceWaiters.length);
  }

  /**
   * Queue an item from a connected output and notify the owner.
   * Items reaching a stopped or interrupted operation are dropped.
   */
  async receive(item: Variant, source: OutputSocket): Promise<void> {
    if (!this.accepting()) {
      return;
    }

    if (isControlTag(item)) {
      if (this.feedback) {
        return;
      }
      const tags = this.mergeControl(item.type, source);
      if (tags.length === 0) {
        return;
      }
      for (const tag of tags) {
        this.queue.push(controlVariant(tag));
      }
    } else {
      while (this._capacity > 0 && this.dataCount >= this._capacity) {
        await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
        if (!this.accepting()) {
          return;
        }
      }
      this.queue.push(item);
      this.dataCount++;
    }

    await this.owner.inputReady(this);
  }

  /** @internal Called by OutputSocket when a connection is made */
  attach(source: OutputSocket): void {
    if (!this.sources.includes(source)) {
      this.sources.push(source);
    }
  }

  /** @internal Called by OutputSocket when a connection is removed */
  detach(source: OutputSocket): void {
    const index = this.sources.indexOf(source);
    if (index !== -1) {
      this.sources.splice(index, 1);
    }
  }

  /**
   * Remove every incoming connection
   */
  disconnectAll(): void {
    for (const source of [...this.sources]) {
      source.disconnectInput(this);
    }
  }

  private accepting(): boolean {
    const state = this.owner.state;
    return state !== OperationState.STOPPED && state !== OperationState.INTERRUPTED;
  }

  /**
   * Tags to queue for `tag` arriving from `source`. With several producers
   * an opening tag passes when the pair is closed and a closing tag when
   * every producer has sent it (or stopped). A repeated tag from the same
   * producer changes nothing.
   */
  private mergeControl(tag: ControlTag, source: OutputSocket): ControlTag[] {
    if (this.sources.length <= 1 || !this.sources.includes(source)) {
      return [tag];
    }
    switch (tag) {
      case ControlTag.SYNC_START:
        return this.openRound(this.sync, source) ? [tag] : [];
      case ControlTag.RESUME:
        return this.openRound(this.pausing, source) ? [tag] : [];
      case ControlTag.SYNC_END:
        this.sync.closed.add(source);
        return this.closeRound(this.sync) ? [tag] : [];
      case ControlTag.PAUSE:
        this.pausing.closed.add(source);
        return this.closeRound(this.pausing) ? [tag] : [];
      case ControlTag.STOP:
        if (this.stopped.has(source)) {
          return [];
        }
        this.stopped.add(source);
        if (this.sources.every((producer) => this.stopped.has(producer))) {
          return [tag];
        }
        // The producers still running may all be paused now
        return this.pausing.closed.size > 0 && this.closeRound(this.pausing) ? [ControlTag.PAUSE] : [];
    }
  }

  private openRound(round: TagRound, source: OutputSocket): boolean {
    round.closed.delete(source);
    if (round.open) {
      return false;
    }
    round.open = true;
    return true;
  }

  private closeRound(round: TagRound): boolean {
    if (!round.open) {
      return false;
    }
    const covered = this.sources.every((producer) => round.closed.has(producer) || this.stopped.has(producer));
    if (covered) {
      round.open = false;
    }
    return covered;
  }

  private releaseSpace(count: number): void {
    for (let i = 0; i < count; i++) {
      const waiter = this.spaceWaiters.shift();
      if (!waiter) {
        break;
      }
      waiter();
    }
  }
}
