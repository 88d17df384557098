import type { OperationState } from '../types/operation.types.js';
import type { InputSocket } from './input-socket.js';

export type SocketDirection = 'input' | 'output';

/**
 * The operation side of a socket
 */
export interface SocketOwner {
  readonly name: string;
  readonly state: OperationState;
  /** Called after an item has been queued on one of the owner's inputs */
  inputReady(socket: InputSocket): Promise<void>;
  /** Called when a connection to or from one of the owner's sockets changes */
  topologyChanged(): void;
}

export interface InputSocketOptions {
  /** Sockets sharing a group are read together, one item from each per step */
  groupId?: number;
  /** An optional input may stay unconnected */
  optional?: boolean;
  /** Closes a cycle: pause and stop never wait for it */
  feedback?: boolean;
  /** Maximum queued data items, 0 for unbounded */
  capacity?: number;
}

export interface OutputSocketOptions {
  groupId?: number;
}
