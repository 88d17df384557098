import { describe, it, expect, beforeEach } from 'vitest';
import { InputSocket } from './input-socket.js';
import { OutputSocket } from './output-socket.js';
import type { SocketOwner } from './types.js';
import { OperationState } from '../types/operation.types.js';
import { ControlTag } from '../types/variant.types.js';
import { controlVariant, intVariant, describeVariant } from '../variant/variant.js';
import { ConnectionError, ValidationError } from '../utils/errors.js';

class FakeOwner implements SocketOwner {
  state: OperationState = OperationState.STOPPED;
  ready: string[] = [];
  topologyChanges = 0;

  constructor(readonly name: string) {}

  async inputReady(socket: InputSocket): Promise<void> {
    this.ready.push(socket.name);
  }

  topologyChanged(): void {
    this.topologyChanges++;
  }
}

function drain(socket: InputSocket): string[] {
  const items: string[] = [];
  for (let item = socket.shift(); item; item = socket.shift()) {
    items.push(describeVariant(item));
  }
  return items;
}

describe('sockets', () => {
  let producer: FakeOwner;
  let consumer: FakeOwner;
  let output: OutputSocket;
  let input: InputSocket;

  beforeEach(() => {
    producer = new FakeOwner('a');
    consumer = new FakeOwner('b');
    output = new OutputSocket(producer, 'output');
    input = new InputSocket(consumer, 'input');
  });

  describe('connections', () => {
    it('should link both ends and report the topology change', () => {
      output.connectInput(input);

      expect(output.connections).toEqual([input]);
      expect(input.connections).toEqual([output]);
      expect(producer.topologyChanges).toBe(1);
      expect(consumer.topologyChanges).toBe(1);
    });

    it('should ignore a repeated connection', () => {
      output.connectInput(input);
      output.connectInput(input);

      expect(output.connections).toHaveLength(1);
      expect(consumer.topologyChanges).toBe(1);
    });

    it('should refuse to connect unless both owners are stopped', () => {
      consumer.state = OperationState.RUNNING;

      expect(() => output.connectInput(input)).toThrow(ConnectionError);
      expect(() => output.connectInput(input)).toThrow(
        'Cannot connect a.output and b.input: b is running'
      );
      expect(output.isConnected()).toBe(false);
      expect(input.isConnected()).toBe(false);
    });

    it('should refuse to disconnect a running pair', () => {
      output.connectInput(input);
      producer.state = OperationState.PAUSED;

      expect(() => output.disconnectInput(input)).toThrow(ConnectionError);
      expect(output.isConnectedTo(input)).toBe(true);
    });

    it('should disconnect every source of an input', () => {
      const other = new OutputSocket(new FakeOwner('c'), 'output');
      output.connectInput(input);
      other.connectInput(input);

      input.disconnectAll();

      expect(input.isConnected()).toBe(false);
      expect(output.isConnected()).toBe(false);
      expect(other.isConnected()).toBe(false);
    });
  });

  describe('delivery', () => {
    beforeEach(() => {
      output.connectInput(input);
      consumer.state = OperationState.RUNNING;
    });

    it('should keep emission order', async () => {
      for (let i = 0; i < 5; i++) {
        await output.emit(intVariant(i));
      }

      expect(drain(input)).toEqual(['0', '1', '2', '3', '4']);
      expect(consumer.ready).toHaveLength(5);
    });

    it('should fan out in connection order', async () => {
      const second = new InputSocket(consumer, 'second');
      consumer.state = OperationState.STOPPED;
      output.connectInput(second);
      consumer.state = OperationState.RUNNING;

      await output.emit(intVariant(7));

      expect(consumer.ready).toEqual(['input', 'second']);
      expect(drain(second)).toEqual(['7']);
    });

    it('should drop items reaching a stopped owner', async () => {
      consumer.state = OperationState.STOPPED;
      await output.emit(intVariant(1));

      consumer.state = OperationState.INTERRUPTED;
      await output.emit(intVariant(2));

      expect(input.queueLength).toBe(0);
      expect(consumer.ready).toEqual([]);
    });

    it('should discard control tags on feedback inputs', async () => {
      const feedback = new InputSocket(consumer, 'loop', { feedback: true });
      consumer.state = OperationState.STOPPED;
      output.connectInput(feedback);
      consumer.state = OperationState.RUNNING;

      await output.emit(controlVariant(ControlTag.SYNC_START));
      await output.emit(intVariant(3));

      expect(drain(feedback)).toEqual(['3']);
      expect(drain(input)).toEqual(['sync-start', '3']);
    });
  });

  describe('fan-in', () => {
    let other: OutputSocket;

    beforeEach(() => {
      other = new OutputSocket(new FakeOwner('c'), 'output');
      output.connectInput(input);
      other.connectInput(input);
      consumer.state = OperationState.RUNNING;
    });

    it('should pass opening tags on their first arrival', async () => {
      await output.emit(controlVariant(ControlTag.SYNC_START));
      await output.emit(intVariant(1));
      await other.emit(controlVariant(ControlTag.SYNC_START));
      await other.emit(intVariant(2));

      expect(drain(input)).toEqual(['sync-start', '1', '2']);
    });

    it('should pass closing tags on their last arrival', async () => {
      await output.emit(intVariant(1));
      await output.emit(controlVariant(ControlTag.STOP));
      await other.emit(intVariant(2));
      await other.emit(controlVariant(ControlTag.STOP));

      expect(drain(input)).toEqual(['1', '2', 'stop']);
    });

    it('should merge pause and resume across rounds', async () => {
      await output.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(controlVariant(ControlTag.RESUME));
      await output.emit(controlVariant(ControlTag.RESUME));
      await output.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(controlVariant(ControlTag.PAUSE));

      expect(drain(input)).toEqual(['pause', 'resume', 'pause']);
    });

    it('should not count one producer twice', async () => {
      await output.emit(controlVariant(ControlTag.PAUSE));
      await output.emit(controlVariant(ControlTag.RESUME));
      await output.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(intVariant(1));

      expect(drain(input)).toEqual(['1']);

      await other.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(controlVariant(ControlTag.RESUME));

      expect(drain(input)).toEqual(['pause', 'resume']);
    });

    it('should ignore a repeated stop from the same producer', async () => {
      await output.emit(controlVariant(ControlTag.STOP));
      await output.emit(controlVariant(ControlTag.STOP));

      expect(drain(input)).toEqual([]);
    });

    it('should pause once the other producers have stopped', async () => {
      await output.emit(controlVariant(ControlTag.PAUSE));
      await other.emit(controlVariant(ControlTag.SYNC_END));
      await other.emit(controlVariant(ControlTag.STOP));

      expect(drain(input)).toEqual(['pause']);
    });

    it('should start over after clear', async () => {
      await output.emit(controlVariant(ControlTag.STOP));
      input.clear();
      await other.emit(controlVariant(ControlTag.STOP));

      expect(drain(input)).toEqual([]);
    });
  });

  describe('capacity', () => {
    it('should reject invalid capacities', () => {
      expect(() => new InputSocket(consumer, 'x', { capacity: -1 })).toThrow(ValidationError);
      expect(() => {
        input.capacity = 1.5;
      }).toThrow(ValidationError);
    });

    it('should hold producers until space is freed', async () => {
      const bounded = new InputSocket(consumer, 'bounded', { capacity: 2 });
      output.connectInput(bounded);
      consumer.state = OperationState.RUNNING;

      await output.emit(intVariant(1));
      await output.emit(intVariant(2));

      let delivered = false;
      const third = output.emit(intVariant(3)).then(() => {
        delivered = true;
      });
      await Promise.resolve();
      expect(delivered).toBe(false);
      expect(bounded.queueLength).toBe(2);

      expect(bounded.shift()).toEqual(intVariant(1));
      await third;

      expect(delivered).toBe(true);
      expect(drain(bounded)).toEqual(['2', '3']);
    });

    it('should never hold control tags', async () => {
      const bounded = new InputSocket(consumer, 'bounded', { capacity: 1 });
      output.connectInput(bounded);
      consumer.state = OperationState.RUNNING;

      await output.emit(intVariant(1));
      await output.emit(controlVariant(ControlTag.STOP));

      expect(drain(bounded)).toEqual(['1', 'stop']);
    });

    it('should release waiting producers on clear without queuing their items', async () => {
      const bounded = new InputSocket(consumer, 'bounded', { capacity: 1 });
      output.connectInput(bounded);
      consumer.state = OperationState.RUNNING;

      await output.emit(intVariant(1));
      const blocked = output.emit(intVariant(2));

      consumer.state = OperationState.INTERRUPTED;
      bounded.clear();
      await blocked;

      expect(bounded.queueLength).toBe(0);
    });
  });
});
