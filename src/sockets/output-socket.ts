import type { Variant } from '../types/variant.types.js';
import { OperationState } from '../types/operation.types.js';
import { ConnectionError } from '../utils/errors.js';
import type { InputSocket } from './input-socket.js';
import type { OutputSocketOptions, SocketOwner } from './types.js';

function assertStopped(output: OutputSocket, input: InputSocket, action: string): void {
  for (const owner of [output.owner, input.owner]) {
    if (owner.state !== OperationState.STOPPED) {
      throw new ConnectionError(
        `Cannot ${action} ${output.path} and ${input.path}: ${owner.name} is ${owner.state}`
      );
    }
  }
}

/**
 * Sending end of a connection. Every emitted item goes to each connected
 * input in connection order.
 */
export class OutputSocket {
  readonly direction = 'output' as const;
  readonly name: string;
  readonly owner: SocketOwner;
  readonly groupId: number;

  private readonly targets: InputSocket[] = [];

  constructor(owner: SocketOwner, name: string, options: OutputSocketOptions = {}) {
    this.owner = owner;
    this.name = name;
    this.groupId = options.groupId ?? 0;
  }

  get path(): string {
    return `${this.owner.name}.${this.name}`;
  }

  get connections(): readonly InputSocket[] {
    return this.targets;
  }

  isConnected(): boolean {
    return this.targets.length > 0;
  }

  isConnectedTo(input: InputSocket): boolean {
    return this.targets.includes(input);
  }

  /**
   * Connect to a downstream input. Both owners must be stopped.
   */
  connectInput(input: InputSocket): void {
    assertStopped(this, input, 'connect');
    if (this.targets.includes(input)) {
      return;
    }
    this.targets.push(input);
    input.attach(this);
    this.owner.topologyChanged();
    input.owner.topologyChanged();
  }

  disconnectInput(input: InputSocket): void {
    const index = this.targets.indexOf(input);
    if (index === -1) {
      return;
    }
    assertStopped(this, input, 'disconnect');
    this.targets.splice(index, 1);
    input.detach(this);
    this.owner.topologyChanged();
    input.owner.topologyChanged();
  }

  disconnectAll(): void {
    for (const input of [...this.targets]) {
      this.disconnectInput(input);
    }
  }

  /**
   * Deliver an item to every connected input. Resolves once each input has
   * queued it, which includes any synchronous processing it triggered.
   */
  async emit(item: Variant): Promise<void> {
    for (const input of [...this.targets]) {
      await input.receive(item, this);
    }
  }
}
