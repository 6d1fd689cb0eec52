import { describe, expect, it } from 'vitest';
import { WriteLock } from './WriteLock';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('WriteLock', () => {
  it('runs tasks one at a time in submission order', async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    const slow = lock.runExclusive(async () => {
      events.push('slow:start');
      await tick();
      await tick();
      events.push('slow:end');
      return 'slow';
    });
    const fast = lock.runExclusive(async () => {
      events.push('fast');
      return 'fast';
    });

    expect(await Promise.all([slow, fast])).toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('releases the lock when a task throws', async () => {
    const lock = new WriteLock();
    const failed = lock.runExclusive(async () => {
      throw new Error('disk full');
    });
    const next = lock.runExclusive(async () => 'ran');

    await expect(failed).rejects.toThrow('disk full');
    expect(await next).toBe('ran');
    expect(lock.queueDepth).toBe(0);
  });
});
