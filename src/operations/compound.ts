/**
 * Compound
 *
 * An operation made of child operations. Its ports are exposed child
 * sockets, its state is reduced from the children's states and lifecycle
 * requests are forwarded to every child in dependency order.
 */

import type { InputSocket } from '../sockets/input-socket.js';
import type { OutputSocket } from '../sockets/output-socket.js';
import type { SocketOwner } from '../sockets/types.js';
import {
  OperationState,
  type OperationFailure,
  type OperationStatistics,
} from '../types/operation.types.js';
import { ConfigurationError, ConnectionError } from '../utils/errors.js';
import { Operation } from './operation.js';

/** States a compound does not leave on its own while children move */
const SETTLED_STATES: ReadonlySet<OperationState> = new Set([
  OperationState.RUNNING,
  OperationState.PAUSED,
  OperationState.STOPPED,
  OperationState.INTERRUPTED,
]);

const ENDED_STATES: ReadonlySet<OperationState> = new Set([
  OperationState.STOPPED,
  OperationState.INTERRUPTED,
]);

interface InboundLink {
  port: string;
  socket: InputSocket;
  peer: OutputSocket;
}

interface OutboundLink {
  port: string;
  socket: OutputSocket;
  peer: InputSocket;
}

export class Compound extends Operation {
  static readonly TYPE = 'Compound';
  readonly type = Compound.TYPE;

  private readonly members: Operation[] = [];
  private readonly exposedInputs = new Map<string, InputSocket>();
  private readonly exposedOutputs = new Map<string, OutputSocket>();
  private readonly subscriptions = new Map<Operation, Array<() => void>>();
  private order: Operation[] = [];
  private _checked = false;
  private firstError: OperationFailure | undefined;

  get inputs(): readonly InputSocket[] {
    return [...this.exposedInputs.values()];
  }

  get outputs(): readonly OutputSocket[] {
    return [...this.exposedOutputs.values()];
  }

  inputPorts(): Array<[string, InputSocket]> {
    return [...this.exposedInputs];
  }

  outputPorts(): Array<[string, OutputSocket]> {
    return [...this.exposedOutputs];
  }

  get checked(): boolean {
    return this._checked && this.members.every((member) => member.checked);
  }

  /** First failure reported by any child during the current run */
  get lastError(): OperationFailure | undefined {
    return this.firstError;
  }

  get statistics(): OperationStatistics {
    const total: OperationStatistics = { steps: 0, totalStepMs: 0, maxStepMs: 0, discardedItems: 0 };
    for (const member of this.members) {
      const stats = member.statistics;
      total.steps += stats.steps;
      total.totalStepMs += stats.totalStepMs;
      total.maxStepMs = Math.max(total.maxStepMs, stats.maxStepMs);
      total.discardedItems += stats.discardedItems;
    }
    return total;
  }

  children(): readonly Operation[] {
    return this.members;
  }

  child(name: string): Operation | undefined {
    return this.members.find((member) => member.name === name);
  }

  /**
   * Children in dependency order, producers first. Feedback connections
   * do not count as dependencies; members of other cycles keep their
   * insertion order at the end.
   */
  dependencyOrder(): Operation[] {
    return this.computeOrder();
  }

  owns(owner: SocketOwner): boolean {
    return this.members.some((member) => member.owns(owner));
  }

  allInputs(): InputSocket[] {
    return this.members.flatMap((member) => member.allInputs());
  }

  allOutputs(): OutputSocket[] {
    return this.members.flatMap((member) => member.allOutputs());
  }

  resolveInput(path: string): InputSocket {
    const dot = path.indexOf('.');
    if (dot === -1) {
      return super.resolveInput(path);
    }
    return this.requireChild(path.slice(0, dot)).resolveInput(path.slice(dot + 1));
  }

  resolveOutput(path: string): OutputSocket {
    const dot = path.indexOf('.');
    if (dot === -1) {
      return super.resolveOutput(path);
    }
    return this.requireChild(path.slice(0, dot)).resolveOutput(path.slice(dot + 1));
  }

  addOperation<T extends Operation>(operation: T): T {
    this.assertStopped('add operations to');
    if (operation.parent) {
      throw new ConfigurationError(`${operation.name} already belongs to ${operation.parent.path}`);
    }
    if (this.child(operation.name)) {
      throw new ConfigurationError(`${this.path} already has a child named '${operation.name}'`);
    }

    this.members.push(operation);
    this.adopt(operation);
    this.topologyChanged();
    return operation;
  }

  /**
   * Detach a child, disconnecting every connection that crosses its boundary
   *
   * @throws ConnectionError when the child or a peer is not stopped
   */
  removeOperation(operation: Operation | string): Operation {
    this.assertStopped('remove operations from');
    const member = this.requireChild(typeof operation === 'string' ? operation : operation.name);
    const inbound = this.inboundLinks(member);
    const outbound = this.outboundLinks(member);
    this.assertLinksStopped(member, inbound, outbound);

    for (const link of inbound) {
      link.peer.disconnectInput(link.socket);
    }
    for (const link of outbound) {
      link.socket.disconnectInput(link.peer);
    }
    this.dropExposures(member);

    this.members.splice(this.members.indexOf(member), 1);
    this.release(member);
    this.topologyChanged();
    return member;
  }

  /**
   * Put `replacement` in place of a child, re-pointing its connections and
   * exposures to ports of the same name. Everything is validated before
   * anything changes.
   *
   * @throws ConfigurationError when the replacement lacks a used port
   * @throws ConnectionError when an affected operation is not stopped
   */
  replaceOperation(operation: Operation | string, replacement: Operation): void {
    this.assertStopped('replace operations in');
    const member = this.requireChild(typeof operation === 'string' ? operation : operation.name);
    if (replacement.parent) {
      throw new ConfigurationError(`${replacement.name} already belongs to ${replacement.parent.path}`);
    }
    const clash = this.child(replacement.name);
    if (clash && clash !== member) {
      throw new ConfigurationError(`${this.path} already has a child named '${replacement.name}'`);
    }

    const inbound = this.inboundLinks(member);
    const outbound = this.outboundLinks(member);
    const exposedIn = [...this.exposedInputs].filter(([, socket]) => member.owns(socket.owner));
    const exposedOut = [...this.exposedOutputs].filter(([, socket]) => member.owns(socket.owner));

    const inputFor = (port: string): InputSocket => {
      const socket = replacement.input(port);
      if (!socket) {
        throw new ConfigurationError(`Replacement ${replacement.name} has no input '${port}'`);
      }
      return socket;
    };
    const outputFor = (port: string): OutputSocket => {
      const socket = replacement.output(port);
      if (!socket) {
        throw new ConfigurationError(`Replacement ${replacement.name} has no output '${port}'`);
      }
      return socket;
    };

    const rewiredIn = inbound.map((link) => ({ link, target: inputFor(link.port) }));
    const rewiredOut = outbound.map((link) => ({ link, source: outputFor(link.port) }));
    const reexposedIn = exposedIn.map(([alias, socket]) => {
      const port = this.portWithin(member, socket);
      return { alias, socket: inputFor(port) };
    });
    const reexposedOut = exposedOut.map(([alias, socket]) => {
      const port = this.portWithin(member, socket);
      return { alias, socket: outputFor(port) };
    });

    this.assertLinksStopped(member, inbound, outbound);
    if (replacement.state !== OperationState.STOPPED) {
      throw new ConnectionError(`Cannot replace ${member.path} with ${replacement.name} while it is ${replacement.state}`);
    }

    for (const { link, target } of rewiredIn) {
      link.peer.disconnectInput(link.socket);
      link.peer.connectInput(target);
    }
    for (const { link, source } of rewiredOut) {
      link.socket.disconnectInput(link.peer);
      source.connectInput(link.peer);
    }
    for (const { alias, socket } of reexposedIn) {
      this.exposedInputs.set(alias, socket);
    }
    for (const { alias, socket } of reexposedOut) {
      this.exposedOutputs.set(alias, socket);
    }

    this.members[this.members.indexOf(member)] = replacement;
    this.release(member);
    this.adopt(replacement);
    this.topologyChanged();
  }

  /**
   * Connect `outputPath` to `inputPath`, both dotted paths relative to
   * this compound
   */
  connect(outputPath: string, inputPath: string): void {
    const output = this.resolveOutput(outputPath);
    const input = this.resolveInput(inputPath);
    output.connectInput(input);
    this.topologyChanged();
  }

  disconnect(outputPath: string, inputPath: string): void {
    const output = this.resolveOutput(outputPath);
    const input = this.resolveInput(inputPath);
    output.disconnectInput(input);
    this.topologyChanged();
  }

  /**
   * Publish a child input as one of this compound's ports
   */
  exposeInput(name: string, path: string): void {
    this.assertStopped('expose ports of');
    this.exposedInputs.set(name, this.resolveChildPath(path, (p) => this.resolveInput(p)));
    this.topologyChanged();
  }

  exposeOutput(name: string, path: string): void {
    this.assertStopped('expose ports of');
    this.exposedOutputs.set(name, this.resolveChildPath(path, (p) => this.resolveOutput(p)));
    this.topologyChanged();
  }

  unexposeInput(name: string): void {
    this.assertStopped('expose ports of');
    if (this.exposedInputs.delete(name)) {
      this.topologyChanged();
    }
  }

  unexposeOutput(name: string): void {
    this.assertStopped('expose ports of');
    if (this.exposedOutputs.delete(name)) {
      this.topologyChanged();
    }
  }

  topologyChanged(): void {
    this._checked = false;
    this.parent?.topologyChanged();
  }

  check(reset: boolean): void {
    if (!ENDED_STATES.has(this.state)) {
      throw new ConfigurationError(`Cannot check ${this.path} while ${this.state}`);
    }

    for (const member of this.members) {
      member.check(reset);
    }
    this.order = this.computeOrder();
    this.firstError = undefined;
    this._checked = true;

    if (this.members.length === 0) {
      this.setState(OperationState.STOPPED);
    } else {
      this.updateState();
    }
  }

  start(): void {
    switch (this.state) {
      case OperationState.STOPPED:
        if (!this.checked) {
          throw new ConfigurationError(`${this.path} must be checked before it is started`);
        }
        this.firstError = undefined;
        this.setState(OperationState.STARTING);
        break;
      case OperationState.PAUSED:
      case OperationState.PAUSING:
        this.setState(OperationState.STARTING);
        break;
      case OperationState.INTERRUPTED:
        throw new ConfigurationError(`${this.path} was interrupted and must be checked before it is started`);
      default:
        return;
    }

    // Consumers first, so that nothing is emitted into a stopped input
    for (const member of [...this.order].reverse()) {
      member.start();
    }
    this.settleEmpty(OperationState.RUNNING);
  }

  pause(): void {
    if (this.state !== OperationState.STARTING && this.state !== OperationState.RUNNING) {
      return;
    }
    this.setState(OperationState.PAUSING);
    for (const member of this.order) {
      member.pause();
    }
    this.settleEmpty(OperationState.PAUSED);
  }

  stop(): void {
    if (ENDED_STATES.has(this.state)) {
      return;
    }
    this.setState(OperationState.STOPPING);
    for (const member of this.order) {
      member.stop();
    }
    this.settleEmpty(OperationState.STOPPED);
  }

  interrupt(): void {
    if (ENDED_STATES.has(this.state)) {
      return;
    }
    for (const member of this.order) {
      member.interrupt();
    }
    this.settleEmpty(OperationState.INTERRUPTED);
  }

  private settleEmpty(state: OperationState): void {
    if (this.members.length === 0) {
      this.setState(state);
    }
  }

  /**
   * Reduce the children's states: forward progress needs every child,
   * failure needs one
   */
  private updateState(): void {
    if (this.members.length === 0) {
      return;
    }
    const states = this.members.map((member) => member.state);
    const all = (state: OperationState): boolean => states.every((s) => s === state);
    const any = (...candidates: OperationState[]): boolean =>
      states.some((s) => candidates.includes(s));

    let next: OperationState | undefined;
    if (all(OperationState.RUNNING)) {
      next = OperationState.RUNNING;
    } else if (all(OperationState.PAUSED)) {
      next = OperationState.PAUSED;
    } else if (states.every((s) => ENDED_STATES.has(s))) {
      next = any(OperationState.INTERRUPTED) ? OperationState.INTERRUPTED : OperationState.STOPPED;
    } else if (SETTLED_STATES.has(this.state)) {
      if (any(OperationState.STOPPING, OperationState.STOPPED, OperationState.INTERRUPTED)) {
        next = OperationState.STOPPING;
      } else if (any(OperationState.PAUSING, OperationState.PAUSED)) {
        next = OperationState.PAUSING;
      } else {
        next = OperationState.STARTING;
      }
    }

    if (next) {
      this.setState(next);
    }
  }

  private handleFailure(failure: OperationFailure): void {
    if (!this.firstError) {
      this.firstError = failure;
      this.logger.warn({ failedOperation: failure.operation, err: failure.error }, 'Child failed, stopping');
    }
    this.reportError(failure);
    for (const member of this.order) {
      member.stop();
    }
  }

  private adopt(member: Operation): void {
    member.parent = this;
    this.subscriptions.set(member, [
      member.onStateChanged(() => this.updateState()),
      member.onError((failure) => this.handleFailure(failure)),
    ]);
    if (!this.order.includes(member)) {
      this.order = [...this.members];
    }
  }

  private release(member: Operation): void {
    for (const unsubscribe of this.subscriptions.get(member) ?? []) {
      unsubscribe();
    }
    this.subscriptions.delete(member);
    member.parent = undefined;
    this.order = this.order.filter((candidate) => candidate !== member);
  }

  private computeOrder(): Operation[] {
    const count = this.members.length;
    const edges = this.members.map(() => new Set<number>());
    const indegree = new Array<number>(count).fill(0);

    this.members.forEach((member, from) => {
      for (const output of member.allOutputs()) {
        for (const input of output.connections) {
          if (input.feedback) {
            continue;
          }
          const to = this.members.findIndex((candidate) => candidate.owns(input.owner));
          if (to === -1 || to === from || edges[from].has(to)) {
            continue;
          }
          edges[from].add(to);
          indegree[to]++;
        }
      }
    });

    const ready: number[] = [];
    for (let i = 0; i < count; i++) {
      if (indegree[i] === 0) {
        ready.push(i);
      }
    }

    const visited = new Set<number>();
    const order: Operation[] = [];
    while (ready.length > 0) {
      const index = ready.shift();
      if (index === undefined) {
        break;
      }
      visited.add(index);
      order.push(this.members[index]);
      for (const to of edges[index]) {
        indegree[to]--;
        if (indegree[to] === 0) {
          ready.push(to);
        }
      }
    }

    // Members of cycles
    this.members.forEach((member, index) => {
      if (!visited.has(index)) {
        order.push(member);
      }
    });
    return order;
  }

  private requireChild(name: string): Operation {
    const member = this.child(name);
    if (!member) {
      throw new ConfigurationError(`No operation '${name}' in ${this.path}`);
    }
    return member;
  }

  private resolveChildPath<T>(path: string, resolve: (path: string) => T): T {
    if (!path.includes('.')) {
      throw new ConfigurationError(`Exposed port must name a child socket as 'child.port', got '${path}'`);
    }
    return resolve(path);
  }

  private assertStopped(action: string): void {
    if (!ENDED_STATES.has(this.state)) {
      throw new ConfigurationError(`Cannot ${action} ${this.path} while ${this.state}`);
    }
  }

  /**
   * Port name under which `member` publishes one of its descendants' sockets
   */
  private portWithin(member: Operation, socket: InputSocket | OutputSocket): string {
    const port = member.portOf(socket);
    if (port === undefined) {
      throw new ConfigurationError(`${socket.path} is connected across ${member.path} without being exposed`);
    }
    return port;
  }

  private inboundLinks(member: Operation): InboundLink[] {
    const links: InboundLink[] = [];
    for (const socket of member.allInputs()) {
      for (const peer of socket.connections) {
        if (!member.owns(peer.owner)) {
          links.push({ port: this.portWithin(member, socket), socket, peer });
        }
      }
    }
    return links;
  }

  private outboundLinks(member: Operation): OutboundLink[] {
    const links: OutboundLink[] = [];
    for (const socket of member.allOutputs()) {
      for (const peer of socket.connections) {
        if (!member.owns(peer.owner)) {
          links.push({ port: this.portWithin(member, socket), socket, peer });
        }
      }
    }
    return links;
  }

  private assertLinksStopped(member: Operation, inbound: InboundLink[], outbound: OutboundLink[]): void {
    const owners: Array<{ name: string; state: OperationState }> = [
      member,
      ...inbound.map((link) => link.peer.owner),
      ...outbound.map((link) => link.peer.owner),
    ];
    for (const owner of owners) {
      if (owner.state !== OperationState.STOPPED) {
        throw new ConnectionError(`Cannot rewire ${member.path}: ${owner.name} is ${owner.state}`);
      }
    }
  }

  private dropExposures(member: Operation): void {
    for (const [alias, socket] of [...this.exposedInputs]) {
      if (member.owns(socket.owner)) {
        this.exposedInputs.delete(alias);
      }
    }
    for (const [alias, socket] of [...this.exposedOutputs]) {
      if (member.owns(socket.owner)) {
        this.exposedOutputs.delete(alias);
      }
    }
  }
}
