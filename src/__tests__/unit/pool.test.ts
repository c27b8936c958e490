/**
 * Unit tests for the worker pool
 */

import { jest, describe, it, expect } from '@jest/globals';
import { WorkerPool } from '../../server/pool.js';

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('WorkerPool', () => {
  it('should name workers HTTPWorker_<n>', async () => {
    const pool = new WorkerPool(2);
    const names: string[] = [];
    const gates = [deferred(), deferred()];

    gates.forEach((gate) =>
      pool.submit(async (name) => {
        names.push(name);
        await gate.promise;
      })
    );

    expect(names).toEqual(['HTTPWorker_0', 'HTTPWorker_1']);
    gates.forEach((gate) => gate.resolve());
    await pool.drain();
  });

  it('should queue tasks beyond its size and run them as workers free up', async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: string[] = [];

    gates.forEach((gate, i) =>
      pool.submit(async (name) => {
        started.push(`${i}:${name}`);
        await gate.promise;
      })
    );

    expect(pool.getActive()).toBe(2);
    expect(pool.getQueued()).toBe(1);
    expect(started).toEqual(['0:HTTPWorker_0', '1:HTTPWorker_1']);

    gates[0].resolve();
    await tick();

    expect(started).toEqual(['0:HTTPWorker_0', '1:HTTPWorker_1', '2:HTTPWorker_0']);
    expect(pool.getActive()).toBe(2);
    expect(pool.getQueued()).toBe(0);

    gates[1].resolve();
    gates[2].resolve();
    await pool.drain();
    expect(pool.getActive()).toBe(0);
  });

  it('should resolve drain only once queued work has finished', async () => {
    const pool = new WorkerPool(1);
    const gates = [deferred(), deferred()];
    let finished = 0;
    gates.forEach((gate) =>
      pool.submit(async () => {
        await gate.promise;
        finished++;
      })
    );

    let drained = false;
    const draining = pool.drain().then(() => {
      drained = true;
    });

    gates[0].resolve();
    await tick();
    expect(drained).toBe(false);

    gates[1].resolve();
    await draining;
    expect(finished).toBe(2);
  });

  it('should resolve drain immediately when idle', async () => {
    await expect(new WorkerPool(3).drain()).resolves.toBeUndefined();
  });

  it('should report failed tasks and keep the worker', async () => {
    const onTaskError = jest.fn<(error: unknown, workerName: string) => void>();
    const pool = new WorkerPool(1, { onTaskError, namePrefix: 'TestWorker' });
    const error = new Error('boom');

    pool.submit(async () => {
      throw error;
    });
    let ranAfter = '';
    pool.submit(async (name) => {
      ranAfter = name;
    });
    await pool.drain();

    expect(onTaskError).toHaveBeenCalledWith(error, 'TestWorker_0');
    expect(ranAfter).toBe('TestWorker_0');
  });

  it('should reject a non-positive size', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});
