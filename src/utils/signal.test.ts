import { describe, it, expect } from 'vitest';
import { Signal } from './signal.js';

describe('Signal', () => {
  it('should wake a waiter', async () => {
    const signal = new Signal();
    let woken = false;
    const waiting = signal.wait().then(() => {
      woken = true;
    });

    expect(signal.waiting).toBe(1);
    signal.notify();
    await waiting;

    expect(woken).toBe(true);
    expect(signal.waiting).toBe(0);
  });

  it('should remember a notification sent before wait', async () => {
    const signal = new Signal();
    signal.notify();

    await expect(signal.wait()).resolves.toBeUndefined();
    expect(signal.waiting).toBe(0);
  });

  it('should consume a remembered notification once', () => {
    const signal = new Signal();
    signal.notify();
    void signal.wait();
    void signal.wait();

    expect(signal.waiting).toBe(1);
  });

  it('should wake all current waiters', async () => {
    const signal = new Signal();
    const a = signal.wait();
    const b = signal.wait();

    signal.notify();

    await expect(Promise.all([a, b])).resolves.toEqual([undefined, undefined]);
  });

  it('should drop a remembered notification on reset', () => {
    const signal = new Signal();
    signal.notify();
    signal.reset();
    void signal.wait();

    expect(signal.waiting).toBe(1);
  });
});
