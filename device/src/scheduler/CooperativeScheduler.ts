import { errorMessage } from '../utils/errors';
import { log } from '../utils/logger';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface ScheduledTask {
  name: string;
  intervalMs: number;
  /** A run still pending after this long is reported as an overrun. */
  timeoutMs: number;
  run(now: number): Promise<unknown> | void;
}

export interface TaskStats {
  runs: number;
  failures: number;
  overruns: number;
  skipped: number; // due while the previous run was still pending
  lastDurationMs: number | null;
}

interface TaskEntry {
  task: ScheduledTask;
  nextDueAt: number;
  running: Promise<void> | null;
  startedAt: number;
  overrunReported: boolean;
  stats: TaskStats;
}

/**
 * Multiplexes fixed-interval tasks on the event loop.
 *
 * `tick()` starts every due task without waiting for it, so a slow task never
 * delays another task's cadence. A task is not re-entered while a previous run
 * is pending. When a task falls behind, it resumes at now + interval rather
 * than firing the missed runs back to back.
 */
export class CooperativeScheduler {
  private entries: TaskEntry[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(private clock: Clock = systemClock) {}

  public addTask(task: ScheduledTask, startAt: number = this.clock.now()): void {
    if (task.intervalMs <= 0) {
      throw new Error(`Task "${task.name}" needs a positive interval`);
    }
    if (this.entries.some((entry) => entry.task.name === task.name)) {
      throw new Error(`Task "${task.name}" is already scheduled`);
    }
    this.entries.push({
      task,
      nextDueAt: startAt,
      running: null,
      startedAt: 0,
      overrunReported: false,
      stats: { runs: 0, failures: 0, overruns: 0, skipped: 0, lastDurationMs: null },
    });
  }

  public tick(): void {
    const now = this.clock.now();

    for (const entry of this.entries) {
      if (entry.running) {
        this.checkOverrun(entry, now);
      }
      if (now < entry.nextDueAt) {
        continue;
      }

      entry.nextDueAt += entry.task.intervalMs;
      if (entry.nextDueAt <= now) {
        entry.nextDueAt = now + entry.task.intervalMs;
      }

      if (entry.running) {
        entry.stats.skipped++;
        log.debug(`Task "${entry.task.name}" still running, skipping this slot`, 'Scheduler');
        continue;
      }
      entry.startedAt = now;
      entry.overrunReported = false;
      entry.running = this.execute(entry, now);
    }
  }

  /** Drive `tick()` from a real timer. */
  public start(resolutionMs: number = 100): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), resolutionMs);
    log.info(`Scheduler started with ${this.entries.length} tasks`, 'Scheduler');
  }

  /** Stop ticking and wait for in-flight runs to settle. */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.idle();
    log.info('Scheduler stopped', 'Scheduler');
  }

  public async idle(): Promise<void> {
    await Promise.all(this.entries.map((entry) => entry.running));
  }

  public getStats(name: string): Readonly<TaskStats> | null {
    const entry = this.entries.find((candidate) => candidate.task.name === name);
    return entry ? { ...entry.stats } : null;
  }

  private async execute(entry: TaskEntry, now: number): Promise<void> {
    try {
      // Deferred so the run always settles after `running` is assigned
      await Promise.resolve().then(() => entry.task.run(now));
    } catch (error) {
      entry.stats.failures++;
      log.error(`Task "${entry.task.name}" failed: ${errorMessage(error)}`, 'Scheduler');
    } finally {
      const finishedAt = this.clock.now();
      this.checkOverrun(entry, finishedAt);
      entry.stats.runs++;
      entry.stats.lastDurationMs = finishedAt - entry.startedAt;
      entry.running = null;
    }
  }

  private checkOverrun(entry: TaskEntry, now: number): void {
    if (entry.overrunReported || now - entry.startedAt <= entry.task.timeoutMs) {
      return;
    }
    entry.overrunReported = true;
    entry.stats.overruns++;
    log.warn(
      `Task "${entry.task.name}" exceeded its ${entry.task.timeoutMs}ms budget`,
      'Scheduler'
    );
  }
}
