import { describe, it, expect, vi } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { DefaultOperation, type DefaultOperationOptions } from './default-operation.js';
import { Compound } from './compound.js';
import type { Operation } from './operation.js';
import { CounterSource } from './impl/base/counter-source.js';
import type { InputSet } from '../flow/types.js';
import { OperationState, ProcessingMode } from '../types/operation.types.js';
import { ControlTag } from '../types/variant.types.js';
import { ConfigurationError, ConnectionError, ExecutionError } from '../utils/errors.js';

class Collector extends DefaultOperation {
  readonly type = 'Collector';
  readonly values: unknown[] = [];
  readonly tags: ControlTag[] = [];
  active = 0;
  maxActive = 0;
  private readonly work: (() => Promise<void>) | undefined;

  constructor(
    name: string,
    options: DefaultOperationOptions & { work?: () => Promise<void> } = {}
  ) {
    super(name, options);
    this.work = options.work;
    this.addInput('input');
  }

  protected async process(inputs: InputSet): Promise<void> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await this.work?.();
      this.values.push(inputs.require('input').value);
    } finally {
      this.active--;
    }
  }

  protected controlReceived(tag: ControlTag): void {
    this.tags.push(tag);
  }
}

/** A source that never emits anything */
class IdleSource extends DefaultOperation {
  readonly type = 'IdleSource';

  constructor(name: string) {
    super(name, { processingMode: ProcessingMode.THREADED });
    this.addOutput('output');
  }

  protected process(): void {}
}

/** A source whose first step waits until released */
class BlockingSource extends DefaultOperation {
  readonly type = 'BlockingSource';
  steps = 0;
  release: () => void = () => undefined;
  readonly entered: Promise<void>;
  private enter: () => void = () => undefined;

  constructor(name: string) {
    super(name, { processingMode: ProcessingMode.THREADED });
    this.addOutput('output');
    this.entered = new Promise((resolve) => {
      this.enter = () => resolve();
    });
  }

  protected async process(): Promise<void> {
    this.steps++;
    const gate = new Promise<void>((resolve) => {
      this.release = () => resolve();
    });
    this.enter();
    await gate;
  }
}

/** Passes ints through, failing on the nth item */
class FailOnItem extends DefaultOperation {
  readonly type = 'FailOnItem';
  private seen = 0;

  constructor(name: string, private readonly failAt: number) {
    super(name);
    this.addInput('input');
    this.addOutput('output');
  }

  protected async process(inputs: InputSet): Promise<void> {
    this.seen++;
    if (this.seen === this.failAt) {
      throw new ExecutionError(`bad item ${this.seen}`);
    }
    await this.emit('output', inputs.require('input'));
  }
}

function recordStates(operation: Operation): OperationState[] {
  const states: OperationState[] = [];
  operation.onStateChanged((state) => states.push(state));
  return states;
}

function counter(name: string, properties: Record<string, unknown>): CounterSource {
  const source = new CounterSource(name);
  for (const [key, value] of Object.entries(properties)) {
    source.setProperty(key, value);
  }
  return source;
}

describe('DefaultOperation', () => {
  describe('check', () => {
    it('should reject an unconnected required input', () => {
      const sink = new Collector('sink');

      expect(() => sink.check(true)).toThrow('Required input sink.input is not connected');
    });

    it('should reject a synchronous source', () => {
      const source = new IdleSource('source');
      source.setProperty('processingMode', ProcessingMode.SYNCHRONOUS);

      expect(() => source.check(true)).toThrow(
        new ConfigurationError('source has no connected inputs and cannot run synchronously')
      );
    });

    it('should require a check before start and after topology changes', () => {
      const source = new IdleSource('source');
      const sink = new Collector('sink');

      expect(() => source.start()).toThrow(ConfigurationError);

      source.check(true);
      expect(source.checked).toBe(true);

      source.resolveOutput('output').connectInput(sink.resolveInput('input'));
      expect(source.checked).toBe(false);
    });

    it('should refuse to change the processing mode while running', async () => {
      const source = new IdleSource('source');
      source.check(true);
      source.start();
      await source.wait(OperationState.RUNNING, 1000);

      expect(() => source.setProperty('processingMode', ProcessingMode.SYNCHRONOUS)).toThrow(
        ConfigurationError
      );

      source.interrupt();
    });
  });

  describe('lifecycle', () => {
    it('should take every operation through the full sequence when stopped without data', async () => {
      const graph = new Compound('graph');
      const source = graph.addOperation(new IdleSource('source'));
      const sink = graph.addOperation(new Collector('sink'));
      graph.connect('source.output', 'sink.input');
      const sourceStates = recordStates(source);
      const sinkStates = recordStates(sink);

      graph.check(true);
      graph.start();
      await graph.wait(OperationState.RUNNING, 1000);
      graph.stop();
      const stopped = await graph.wait(OperationState.STOPPED, 1000);

      const expected = [
        OperationState.STARTING,
        OperationState.RUNNING,
        OperationState.STOPPING,
        OperationState.STOPPED,
      ];
      expect(stopped).toBe(true);
      expect(sourceStates).toEqual(expected);
      expect(sinkStates).toEqual(expected);
      expect(sink.tags).toEqual([ControlTag.SYNC_START, ControlTag.SYNC_END, ControlTag.STOP]);
      expect(sink.values).toEqual([]);
    });

    it('should refuse connections while running', async () => {
      const source = new IdleSource('source');
      const sink = new Collector('sink');
      source.check(true);
      source.start();

      expect(() => source.resolveOutput('output').connectInput(sink.resolveInput('input'))).toThrow(
        ConnectionError
      );
      expect(sink.resolveInput('input').isConnected()).toBe(false);

      source.interrupt();
    });

    it('should need a check after an interrupt', () => {
      const source = new IdleSource('source');
      source.check(true);
      source.start();
      source.interrupt();

      expect(source.state).toBe(OperationState.INTERRUPTED);
      expect(() => source.start()).toThrow(ConfigurationError);

      source.check(false);
      expect(source.state).toBe(OperationState.STOPPED);
    });
  });

  describe('ordering', () => {
    it('should deliver items in emission order', async () => {
      const graph = new Compound('graph');
      graph.addOperation(counter('source', { maxCount: 1000 }));
      const sink = graph.addOperation(new Collector('sink'));
      graph.connect('source.output', 'sink.input');

      graph.check(true);
      graph.start();
      await graph.wait(OperationState.STOPPED, 5000);

      expect(sink.values).toEqual(Array.from({ length: 1000 }, (_, i) => i));
    });

    it('should keep order through a bounded queue', async () => {
      const graph = new Compound('graph');
      graph.addOperation(counter('source', { maxCount: 50 }));
      const sink = graph.addOperation(
        new Collector('sink', {
          processingMode: ProcessingMode.THREADED,
          work: () => delay(0),
        })
      );
      sink.resolveInput('input').capacity = 2;
      graph.connect('source.output', 'sink.input');

      graph.check(true);
      graph.start();
      await graph.wait(OperationState.STOPPED, 5000);

      expect(sink.values).toEqual(Array.from({ length: 50 }, (_, i) => i));
    });
  });

  describe('concurrency', () => {
    it.each([ProcessingMode.SYNCHRONOUS, ProcessingMode.THREADED])(
      'should never overlap steps of a %s operation fed by two producers',
      async (processingMode) => {
        const graph = new Compound('graph');
        graph.addOperation(counter('a', { maxCount: 50 }));
        graph.addOperation(counter('b', { start: 1000, maxCount: 50 }));
        const sink = graph.addOperation(
          new Collector('sink', {
            processingMode,
            work: async () => {
              await new Promise<void>((resolve) => setImmediate(resolve));
            },
          })
        );
        graph.connect('a.output', 'sink.input');
        graph.connect('b.output', 'sink.input');

        graph.check(true);
        graph.start();
        await graph.wait(OperationState.STOPPED, 5000);

        expect(sink.maxActive).toBe(1);
        expect(sink.values).toHaveLength(100);
        expect(sink.tags).toEqual([ControlTag.SYNC_START, ControlTag.SYNC_END, ControlTag.STOP]);
      }
    );
  });

  describe('pause', () => {
    it('should not reach Paused before queued data is drained', async () => {
      const producer = counter('producer', { maxCount: 1000, autoStop: false });
      const consumer = new Collector('consumer', {
        processingMode: ProcessingMode.THREADED,
        work: () => delay(1),
      });
      const input = consumer.resolveInput('input');
      producer.resolveOutput('output').connectInput(input);

      let queuedWhenPaused = -1;
      let processedWhenPaused = -1;
      consumer.onStateChanged((state) => {
        if (state === OperationState.PAUSED) {
          queuedWhenPaused = input.queueLength;
          processedWhenPaused = consumer.values.length;
        }
      });

      consumer.check(true);
      producer.check(true);
      consumer.start();
      producer.start();
      await producer.wait(OperationState.PAUSED, 5000);

      const queuedAtRequest = input.queueLength;
      consumer.pause();
      expect(consumer.state).toBe(OperationState.PAUSING);

      const paused = await consumer.wait(OperationState.PAUSED, 8000);

      expect(paused).toBe(true);
      expect(queuedAtRequest).toBeGreaterThan(0);
      expect(queuedWhenPaused).toBe(0);
      expect(processedWhenPaused).toBe(1000);

      producer.interrupt();
      consumer.interrupt();
    });

    it('should keep a fan-in running while one producer pauses repeatedly', async () => {
      const graph = new Compound('graph');
      const batches = graph.addOperation(counter('batches', { maxCount: 1, autoStop: false }));
      graph.addOperation(counter('stream', {}));
      const sink = graph.addOperation(new Collector('sink'));
      graph.connect('batches.output', 'sink.input');
      graph.connect('stream.output', 'sink.input');
      graph.check(true);

      graph.start();
      await batches.wait(OperationState.PAUSED, 2000);
      batches.start();
      await batches.wait(OperationState.PAUSED, 2000);

      expect(sink.state).toBe(OperationState.RUNNING);
      expect(sink.tags).not.toContain(ControlTag.PAUSE);

      graph.stop();
      expect(await graph.wait(OperationState.STOPPED, 2000)).toBe(true);
      expect(sink.tags).toEqual([ControlTag.SYNC_START, ControlTag.SYNC_END, ControlTag.STOP]);
    });

    it('should resume when started again while pausing', async () => {
      const graph = new Compound('graph');
      const source = graph.addOperation(counter('source', {}));
      const sink = graph.addOperation(
        new Collector('sink', { processingMode: ProcessingMode.THREADED, work: () => delay(1) })
      );
      graph.connect('source.output', 'sink.input');
      graph.check(true);

      graph.start();
      await graph.wait(OperationState.RUNNING, 2000);
      graph.pause();
      graph.start();

      expect(await graph.wait(OperationState.RUNNING, 2000)).toBe(true);
      await delay(50);
      expect(graph.state).toBe(OperationState.RUNNING);
      expect(source.state).toBe(OperationState.RUNNING);
      expect(sink.state).toBe(OperationState.RUNNING);

      graph.interrupt();
    });
  });

  describe('failure', () => {
    it('should stop downstream operations after a failed step', async () => {
      const graph = new Compound('graph');
      graph.addOperation(counter('source', {}));
      const failing = graph.addOperation(new FailOnItem('X', 5));
      const sibling = graph.addOperation(new Collector('Y'));
      graph.connect('source.output', 'X.input');
      graph.connect('X.output', 'Y.input');
      const errors = vi.fn();
      graph.onError(errors);

      graph.check(true);
      graph.start();
      await graph.wait(OperationState.STOPPED, 5000);

      expect(graph.lastError?.operation).toBe('X');
      expect(graph.lastError?.error).toBeInstanceOf(ExecutionError);
      expect(graph.lastError?.error.message).toBe('bad item 5');
      expect(errors).toHaveBeenCalledTimes(1);
      expect(failing.lastError?.operation).toBe('X');
      expect(sibling.state).toBe(OperationState.STOPPED);
      expect(sibling.values).toEqual([0, 1, 2, 3]);
      expect(sibling.tags.at(-1)).toBe(ControlTag.STOP);
    });
  });

  describe('interrupt', () => {
    it('should not wait for a blocked step', async () => {
      const source = new BlockingSource('source');
      source.check(true);
      source.start();
      await source.entered;

      source.interrupt();

      expect(source.state).toBe(OperationState.INTERRUPTED);

      source.release();
      await delay(10);

      expect(source.steps).toBe(1);
      expect(source.state).toBe(OperationState.INTERRUPTED);
    });
  });

  describe('statistics', () => {
    it('should count steps and reset them on check(true)', async () => {
      const graph = new Compound('graph');
      const source = graph.addOperation(counter('source', { maxCount: 3 }));
      const sink = graph.addOperation(new Collector('sink'));
      graph.connect('source.output', 'sink.input');

      graph.check(true);
      graph.start();
      await graph.wait(OperationState.STOPPED, 5000);

      expect(sink.statistics.steps).toBe(3);
      expect(source.statistics.steps).toBe(3);
      expect(graph.statistics.steps).toBe(6);

      graph.check(true);

      expect(sink.statistics.steps).toBe(0);
    });
  });
});
