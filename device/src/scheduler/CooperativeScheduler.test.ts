import { describe, expect, it } from 'vitest';
import { Clock, CooperativeScheduler } from './CooperativeScheduler';

class ManualClock implements Clock {
  constructor(public current = 0) {}

  public now(): number {
    return this.current;
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}

describe('CooperativeScheduler', () => {
  it('runs tasks on their own intervals', async () => {
    const clock = new ManualClock();
    const scheduler = new CooperativeScheduler(clock);
    const runs: string[] = [];
    scheduler.addTask({ name: 'sample', intervalMs: 2000, timeoutMs: 500, run: (now) => void runs.push(`sample@${now}`) });
    scheduler.addTask({ name: 'uplink', intervalMs: 10000, timeoutMs: 1500, run: (now) => void runs.push(`uplink@${now}`) });

    for (let t = 0; t <= 10000; t += 1000) {
      clock.current = t;
      scheduler.tick();
      await scheduler.idle();
    }

    expect(runs).toEqual([
      'sample@0',
      'uplink@0',
      'sample@2000',
      'sample@4000',
      'sample@6000',
      'sample@8000',
      'sample@10000',
      'uplink@10000',
    ]);
  });

  it('keeps other tasks on cadence while one is slow and never re-enters it', async () => {
    const clock = new ManualClock();
    const scheduler = new CooperativeScheduler(clock);
    const upload = deferred();
    let uploads = 0;
    let samples = 0;
    scheduler.addTask({
      name: 'uplink',
      intervalMs: 1000,
      timeoutMs: 1500,
      run: () => {
        uploads++;
        return upload.promise;
      },
    });
    scheduler.addTask({ name: 'sample', intervalMs: 1000, timeoutMs: 500, run: () => void samples++ });

    for (let t = 0; t <= 3000; t += 1000) {
      clock.current = t;
      scheduler.tick();
      await flush();
    }

    expect(uploads).toBe(1);
    expect(samples).toBe(4);
    expect(scheduler.getStats('uplink')).toMatchObject({ runs: 0, skipped: 3, overruns: 1 });

    upload.resolve();
    await scheduler.idle();
    expect(scheduler.getStats('uplink')).toMatchObject({ runs: 1, overruns: 1, lastDurationMs: 3000 });
  });

  it('contains failing tasks', async () => {
    const clock = new ManualClock();
    const scheduler = new CooperativeScheduler(clock);
    let displayRuns = 0;
    scheduler.addTask({
      name: 'sample',
      intervalMs: 1000,
      timeoutMs: 500,
      run: async () => {
        throw new Error('sensor bus error');
      },
    });
    scheduler.addTask({
      name: 'broken',
      intervalMs: 1000,
      timeoutMs: 500,
      run: () => {
        throw new Error('synchronous failure');
      },
    });
    scheduler.addTask({ name: 'display', intervalMs: 1000, timeoutMs: 500, run: () => void displayRuns++ });

    for (let t = 0; t <= 1000; t += 1000) {
      clock.current = t;
      scheduler.tick();
      await scheduler.idle();
    }

    expect(displayRuns).toBe(2);
    expect(scheduler.getStats('sample')).toMatchObject({ runs: 2, failures: 2 });
    expect(scheduler.getStats('broken')).toMatchObject({ runs: 2, failures: 2 });
  });

  it('resumes at now + interval after falling behind instead of bursting', async () => {
    const clock = new ManualClock();
    const scheduler = new CooperativeScheduler(clock);
    const runs: number[] = [];
    scheduler.addTask({ name: 'sample', intervalMs: 1000, timeoutMs: 500, run: (now) => void runs.push(now) });

    scheduler.tick();
    await scheduler.idle();
    clock.current = 5500;
    scheduler.tick();
    await scheduler.idle();
    clock.current = 6000;
    scheduler.tick();
    await scheduler.idle();
    clock.current = 6500;
    scheduler.tick();
    await scheduler.idle();

    expect(runs).toEqual([0, 5500, 6500]);
  });

  it('rejects duplicate names and non-positive intervals', () => {
    const scheduler = new CooperativeScheduler(new ManualClock());
    scheduler.addTask({ name: 'sample', intervalMs: 1000, timeoutMs: 500, run: () => undefined });

    expect(() => scheduler.addTask({ name: 'sample', intervalMs: 1000, timeoutMs: 500, run: () => undefined })).toThrow(
      'Task "sample" is already scheduled'
    );
    expect(() => scheduler.addTask({ name: 'other', intervalMs: 0, timeoutMs: 500, run: () => undefined })).toThrow(
      'Task "other" needs a positive interval'
    );
    expect(scheduler.getStats('missing')).toBeNull();
  });
});
