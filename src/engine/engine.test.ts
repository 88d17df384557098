import { describe, it, expect, afterEach } from 'vitest';
import { Engine } from './engine.js';
import { Compound } from '../operations/compound.js';
import { CounterSource } from '../operations/impl/base/counter-source.js';
import { OperationState } from '../types/operation.types.js';
import {
  ConfigurationError,
  ExecutionTimeoutError,
  ValidationError,
} from '../utils/errors.js';

function counterToTrace(maxCount: number): Record<string, unknown> {
  return {
    version: 1,
    operations: {
      counter: { type: 'CounterSource', properties: { maxCount } },
      trace: { type: 'DebugOperation', properties: { outputStream: 'log' } },
    },
    connections: [{ output: 'counter.output', inputs: ['trace.input'] }],
  };
}

describe('Engine', () => {
  let engine: Engine;

  afterEach(() => {
    engine.dispose();
  });

  describe('load', () => {
    it('should build the graph a document describes', () => {
      engine = new Engine();

      engine.load(counterToTrace(3));

      expect(engine.root.children().map((child) => child.name)).toEqual(['counter', 'trace']);
      expect(engine.root.child('counter')).toBeInstanceOf(CounterSource);
      expect(engine.root.child('counter')?.property('maxCount')).toBe(3);
    });

    it('should build nested compounds with exposed ports', () => {
      engine = new Engine();

      engine.load({
        version: 1,
        operations: {
          counter: { type: 'CounterSource', properties: { maxCount: 2 } },
          inner: {
            type: 'Compound',
            operations: { trace: { type: 'DebugOperation', properties: { outputStream: 'log' } } },
            inputs: { in: 'trace.input' },
          },
        },
        connections: [{ output: 'counter.output', inputs: ['inner.in'] }],
      });

      const inner = engine.root.child('inner');
      expect(inner).toBeInstanceOf(Compound);
      expect(engine.root.resolveInput('inner.in').path).toBe('inner.trace.input');
    });

    it('should reject malformed documents', () => {
      engine = new Engine();

      expect(() => engine.load({ version: 2, operations: {} })).toThrow(ValidationError);
      expect(() => engine.load({ version: 1, operations: { a: { properties: {} } } })).toThrow(
        /^Invalid graph document: operations\.a\.type: /
      );
    });

    it('should reject unknown operation types', () => {
      engine = new Engine();

      expect(() =>
        engine.load({ version: 1, operations: { x: { type: 'Teleporter' } } })
      ).toThrow(new ConfigurationError("Unknown operation type 'Teleporter'"));
    });

    it('should report bad property values as configuration errors', () => {
      engine = new Engine();

      expect(() =>
        engine.load({
          version: 1,
          operations: { counter: { type: 'CounterSource', properties: { maxCount: -5 } } },
        })
      ).toThrow(ConfigurationError);
    });

    it('should keep the current graph when loading fails', () => {
      engine = new Engine();
      engine.load(counterToTrace(3));

      expect(() => engine.load({ version: 1, operations: { x: { type: 'Nope' } } })).toThrow();

      expect(engine.root.children().map((child) => child.name)).toEqual(['counter', 'trace']);
    });
  });

  describe('save', () => {
    it('should write back topology and property values', () => {
      engine = new Engine();
      engine.load(counterToTrace(3));

      const document = engine.save();

      expect(document.version).toBe(1);
      expect(document.operations.counter).toEqual({
        type: 'CounterSource',
        properties: {
          processingMode: 'threaded',
          start: 0,
          step: 1,
          maxCount: 3,
          autoStop: true,
        },
      });
      expect(document.operations.trace?.properties).toMatchObject({ outputStream: 'log' });
      expect(document.connections).toEqual([{ output: 'counter.output', inputs: ['trace.input'] }]);
      expect(document.inputs).toEqual({});
      expect(document.outputs).toEqual({});
    });

    it('should record connections through exposed ports', () => {
      engine = new Engine();
      engine.load({
        version: 1,
        operations: {
          counter: { type: 'CounterSource' },
          inner: {
            type: 'Compound',
            operations: { trace: { type: 'DebugOperation' } },
            inputs: { in: 'trace.input' },
          },
        },
        connections: [{ output: 'counter.output', inputs: ['inner.in'] }],
      });

      const document = engine.save();

      expect(document.connections).toEqual([{ output: 'counter.output', inputs: ['inner.in'] }]);
      expect(document.operations.inner).toMatchObject({
        type: 'Compound',
        connections: [],
        inputs: { in: 'trace.input' },
        outputs: {},
      });
      expect(Object.keys(document.operations.inner?.operations ?? {})).toEqual(['trace']);
    });

    it('should load what it saves', () => {
      engine = new Engine();
      engine.load(counterToTrace(4));
      const saved = engine.save();

      const copy = new Engine();
      try {
        copy.load(saved);
        expect(copy.save()).toEqual(saved);
      } finally {
        copy.dispose();
      }
    });
  });

  describe('execute', () => {
    it('should run the graph to completion', async () => {
      engine = new Engine();
      engine.load(counterToTrace(3));

      const result = await engine.execute();

      expect(result.success).toBe(true);
      expect(engine.state).toBe(OperationState.STOPPED);
      const trace = result.summary.operationTotals.find((entry) => entry.name === 'trace');
      expect(trace?.count).toBe(3);
    });

    it('should run again after finishing', async () => {
      engine = new Engine();
      engine.load(counterToTrace(2));

      await engine.execute();
      const result = await engine.execute();

      expect(result.success).toBe(true);
      const trace = result.summary.operationTotals.find((entry) => entry.name === 'trace');
      expect(trace?.count).toBe(2);
    });

    it('should succeed at once for an empty graph', async () => {
      engine = new Engine();

      const result = await engine.execute();

      expect(result.success).toBe(true);
      expect(engine.state).toBe(OperationState.STOPPED);
    });

    it('should report check failures against the root', async () => {
      engine = new Engine();
      engine.load({
        version: 1,
        operations: {
          counter: { type: 'CounterSource', properties: { maxCount: 1 } },
          trace: { type: 'DebugOperation' },
        },
      });

      const result = await engine.execute();

      expect(result).toMatchObject({
        success: false,
        operation: 'root',
        message: 'Required input trace.input is not connected',
      });
    });

    it('should interrupt a graph that runs past the timeout', async () => {
      engine = new Engine();
      engine.load(counterToTrace(-1));

      const result = await engine.execute({ timeoutMs: 50 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ExecutionTimeoutError);
        expect(result.message).toBe('Execution did not finish within 50ms');
      }
      expect(engine.state).toBe(OperationState.INTERRUPTED);
    });

    it('should report the operation that failed', async () => {
      engine = new Engine();
      engine.load({
        version: 1,
        operations: {
          left: { type: 'CounterSource', properties: { start: 1, maxCount: 2 } },
          right: { type: 'CounterSource', properties: { start: 0, maxCount: 2 } },
          calc: { type: 'ArithmeticOperation', properties: { operator: 'divide' } },
          trace: { type: 'DebugOperation', properties: { outputStream: 'log' } },
        },
        connections: [
          { output: 'left.output', inputs: ['calc.input0'] },
          { output: 'right.output', inputs: ['calc.input1'] },
          { output: 'calc.output', inputs: ['trace.input'] },
        ],
      });

      const result = await engine.execute();

      expect(result).toMatchObject({
        success: false,
        operation: 'calc',
        message: 'Integer division by zero in calc',
      });
    });
  });

  describe('dispose', () => {
    it('should refuse further use', async () => {
      engine = new Engine();
      engine.dispose();

      await expect(engine.execute()).rejects.toThrow(new ConfigurationError('Engine has been disposed'));
      expect(() => engine.start()).toThrow(ConfigurationError);
    });
  });
});
