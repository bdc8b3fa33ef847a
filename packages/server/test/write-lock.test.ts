/**
 * WriteLock Tests
 */

import { describe, it, expect } from 'vitest';
import { WriteLock } from '../src/writer/write-lock.js';

describe('WriteLock', () => {
  it('should grant the lock immediately when free', async () => {
    const lock = new WriteLock();
    const release = await lock.acquire();

    expect(lock.isLocked).toBe(true);
    release();
    expect(lock.isLocked).toBe(false);
  });

  it('should hand the lock over in arrival order', async () => {
    const lock = new WriteLock();
    const order: string[] = [];

    const first = await lock.acquire();
    const second = lock.acquire().then((release) => { order.push('second'); return release; });
    const third = lock.acquire().then((release) => { order.push('third'); return release; });
    expect(lock.pending).toBe(2);

    first();
    (await second)();
    (await third)();

    expect(order).toEqual(['second', 'third']);
    expect(lock.isLocked).toBe(false);
    expect(lock.pending).toBe(0);
  });

  it('should ignore a second release', async () => {
    const lock = new WriteLock();
    const first = await lock.acquire();
    const waiting = lock.acquire();

    first();
    first();
    const second = await waiting;

    expect(lock.isLocked).toBe(true);
    second();
    expect(lock.isLocked).toBe(false);
  });

  it('should never run exclusive sections concurrently', async () => {
    const lock = new WriteLock();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        lock.runExclusive(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, n));
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(1);
  });

  it('should release when the section throws', async () => {
    const lock = new WriteLock();

    await expect(lock.runExclusive(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(lock.isLocked).toBe(false);
  });
});
