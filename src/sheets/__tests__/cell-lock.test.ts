/**
 * Keyed Mutex Tests
 */

import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../cell-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks on the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('A1', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('A1', async () => {
      log.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('lets different keys run side by side', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const gate = deferred();

    const blocked = mutex.runExclusive('A1', async () => {
      await gate.promise;
      log.push('A1');
    });
    await mutex.runExclusive('B2', async () => {
      log.push('B2');
    });

    expect(log).toEqual(['B2']);
    gate.resolve();
    await blocked;
    expect(log).toEqual(['B2', 'A1']);
  });

  it('keeps the queue moving after a failed task', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('A1', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('A1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets keys once their queue drains', async () => {
    const mutex = new KeyedMutex();
    await Promise.all([
      mutex.runExclusive('A1', async () => undefined),
      mutex.runExclusive('A1', async () => undefined),
      mutex.runExclusive('B2', async () => undefined),
    ]);
    expect(mutex.pendingKeys).toBe(0);
  });
});
