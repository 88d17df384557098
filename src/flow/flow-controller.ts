import { ControlTag } from '../types/variant.types.js';
import type { InputSocket } from '../sockets/input-socket.js';
import { isControlTag } from '../variant/variant.js';
import { ConfigurationError, ExecutionError } from '../utils/errors.js';
import {
  FlowControllerKind,
  InputSet,
  type FlowStep,
  type GroupState,
} from './types.js';

interface FlowGroup {
  id: number;
  /** Every connected socket of the group */
  sockets: InputSocket[];
  /** Sockets that carry control tags (feedback inputs never do) */
  controlled: InputSocket[];
  state: GroupState;
}

type Phase = 'running' | 'paused' | 'finished';

export interface FlowControllerOptions {
  /** Called for every control tag consumed from a group */
  onControl?: (tag: ControlTag, groupId: number) => void;
}

const INCOMPLETE: FlowStep = { kind: 'incomplete' };

/**
 * Decides when an operation may run a step and which items it reads.
 *
 * Inputs are partitioned by group id. A group is ready when each of its
 * sockets has a data item at the head. A control tag at the head of any
 * socket takes precedence: data heads on the group's other sockets can no
 * longer be paired and are discarded until every socket shows a tag.
 * Pause, resume and stop complete operation-wide once every group that
 * carries control tags agrees.
 */
export class FlowController {
  readonly kind: FlowControllerKind;

  private readonly groups: FlowGroup[];
  private readonly quiescence: FlowGroup[];
  private nextGroup = 0;
  private phase: Phase = 'running';
  private discarded = 0;
  private readonly onControl: FlowControllerOptions['onControl'];

  constructor(connectedInputs: readonly InputSocket[], options: FlowControllerOptions = {}) {
    this.onControl = options.onControl;
    const byId = new Map<number, FlowGroup>();
    for (const socket of connectedInputs) {
      let group = byId.get(socket.groupId);
      if (!group) {
        group = { id: socket.groupId, sockets: [], controlled: [], state: 'open' };
        byId.set(socket.groupId, group);
      }
      group.sockets.push(socket);
      if (!socket.feedback) {
        group.controlled.push(socket);
      }
    }

    this.groups = [...byId.values()].sort((a, b) => a.id - b.id);
    this.quiescence = this.groups.filter((group) => group.controlled.length > 0);

    if (this.groups.length > 0 && this.quiescence.length === 0) {
      throw new ConfigurationError('An operation cannot have only feedback inputs connected');
    }

    if (connectedInputs.length === 0) {
      this.kind = FlowControllerKind.SOURCE;
    } else if (connectedInputs.length === 1) {
      this.kind = FlowControllerKind.ONE_INPUT;
    } else {
      this.kind = FlowControllerKind.MULTI_GROUP;
    }
  }

  /** Data items dropped because they could not be paired before a control tag, over the controller's lifetime */
  get discardedItems(): number {
    return this.discarded;
  }

  get groupIds(): number[] {
    return this.groups.map((group) => group.id);
  }

  groupState(groupId: number): GroupState | undefined {
    return this.groups.find((group) => group.id === groupId)?.state;
  }

  /**
   * Forget group states before a new run
   */
  reset(): void {
    for (const group of this.groups) {
      group.state = 'open';
    }
    this.nextGroup = 0;
    this.phase = 'running';
  }

  /**
   * Inspect the queues and consume what the next step needs
   *
   * @throws ExecutionError when a group's sockets hold different control tags
   */
  prepareProcess(): FlowStep {
    switch (this.kind) {
      case FlowControllerKind.SOURCE:
        return { kind: 'data', groupId: 0, inputs: new InputSet(0) };
      case FlowControllerKind.ONE_INPUT:
        return this.evaluateGroup(this.groups[0]) ?? INCOMPLETE;
      case FlowControllerKind.MULTI_GROUP:
        return this.roundRobin();
    }
  }

  private roundRobin(): FlowStep {
    const count = this.groups.length;
    for (let offset = 0; offset < count; offset++) {
      const index = (this.nextGroup + offset) % count;
      const step = this.evaluateGroup(this.groups[index]);
      if (step) {
        this.nextGroup = (index + 1) % count;
        return step;
      }
    }
    return INCOMPLETE;
  }

  private evaluateGroup(group: FlowGroup | undefined): FlowStep | null {
    if (!group || this.phase === 'finished') {
      return null;
    }

    const controlPending = group.controlled.some((socket) => {
      const head = socket.peek();
      return head !== undefined && isControlTag(head);
    });
    if (controlPending) {
      return this.consumeControl(group);
    }

    if (group.sockets.some((socket) => socket.queueLength === 0)) {
      return null;
    }

    const inputs = new InputSet(group.id);
    for (const socket of group.sockets) {
      const item = socket.shift();
      if (item && !isControlTag(item)) {
        inputs.set(socket.name, item);
      }
    }
    return { kind: 'data', groupId: group.id, inputs };
  }

  private consumeControl(group: FlowGroup): FlowStep | null {
    let tag: ControlTag | undefined;
    let origin: InputSocket | undefined;

    for (const socket of group.controlled) {
      let head = socket.peek();
      while (head !== undefined && !isControlTag(head)) {
        socket.shift();
        this.discarded++;
        head = socket.peek();
      }
      if (head === undefined) {
        return null;
      }
      if (tag === undefined || origin === undefined) {
        tag = head.type;
        origin = socket;
      } else if (head.type !== tag) {
        throw new ExecutionError(
          `Synchronization error in group ${group.id}: '${tag}' on ${origin.path} but '${head.type}' on ${socket.path}`
        );
      }
    }

    if (tag === undefined) {
      return null;
    }
    for (const socket of group.controlled) {
      socket.shift();
    }
    this.onControl?.(tag, group.id);
    return this.applyControl(group, tag);
  }

  private applyControl(group: FlowGroup, tag: ControlTag): FlowStep {
    switch (tag) {
      case ControlTag.SYNC_START:
        group.state = 'open';
        return { kind: 'sync', groupId: group.id, tag };
      case ControlTag.SYNC_END:
        return { kind: 'sync', groupId: group.id, tag };
      case ControlTag.PAUSE:
        group.state = 'paused';
        break;
      case ControlTag.RESUME:
        group.state = 'open';
        break;
      case ControlTag.STOP:
        group.state = 'stopped';
        break;
    }
    return this.resolvePhase() ?? { kind: 'control', groupId: group.id, tag };
  }

  /**
   * Operation-wide transition once every quiescence group agrees
   */
  private resolvePhase(): FlowStep | null {
    const states = this.quiescence.map((group) => group.state);

    if (states.every((state) => state === 'stopped')) {
      this.phase = 'finished';
      return { kind: 'finished' };
    }
    if (this.phase === 'running' && states.every((state) => state !== 'open')) {
      this.phase = 'paused';
      return { kind: 'pause' };
    }
    if (this.phase === 'paused' && !states.includes('paused')) {
      this.phase = 'running';
      return { kind: 'resume' };
    }
    return null;
  }
}
