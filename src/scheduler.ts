import { type MonitorError, toMonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";

/** Longest delay `setInterval` honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ScheduledJob {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  /** Also run once as soon as the scheduler starts. */
  runOnStart?: boolean;
}

export interface JobStats {
  runs: number;
  failures: number;
  skippedTicks: number;
  lastRunAt: string | null;
  lastError: string | null;
}

export interface SchedulerOptions {
  logger?: LoggerLike;
  /** Called after a run throws, with the failure already classified. */
  onJobFailure?: (jobName: string, failure: MonitorError) => void;
}

interface JobState {
  job: ScheduledJob;
  timer?: ReturnType<typeof setInterval>;
  inFlight?: Promise<void>;
  stats: JobStats;
}

/**
 * Runs async jobs on fixed intervals. A job never overlaps itself: a tick that
 * arrives while the previous run is still in flight is skipped.
 */
export class PeriodicScheduler {
  private readonly jobs = new Map<string, JobState>();
  private readonly logger: LoggerLike;
  private readonly onJobFailure?: (jobName: string, failure: MonitorError) => void;
  private running = false;

  constructor(options: SchedulerOptions = {}) {
    this.logger = options.logger ?? createLogger("scheduler");
    this.onJobFailure = options.onJobFailure;
  }

  addJob(job: ScheduledJob): void {
    if (this.jobs.has(job.name)) {
      throw new Error(`Job ${job.name} is already scheduled`);
    }
    if (!(job.intervalMs > 0) || job.intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(
        `Job ${job.name} interval must be between 1 and ${MAX_TIMER_DELAY_MS} ms`,
      );
    }
    const state: JobState = {
      job,
      stats: {
        runs: 0,
        failures: 0,
        skippedTicks: 0,
        lastRunAt: null,
        lastError: null,
      },
    };
    this.jobs.set(job.name, state);
    if (this.running) {
      this.arm(state);
    }
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (const state of this.jobs.values()) {
      this.arm(state);
    }
    this.logger.info(`Scheduler started with ${this.jobs.size} jobs`);
  }

  /** Stops issuing ticks and waits for in-flight runs to settle. */
  async stop(): Promise<void> {
    this.running = false;
    const pending: Promise<void>[] = [];
    for (const state of this.jobs.values()) {
      if (state.timer !== undefined) {
        clearInterval(state.timer);
        state.timer = undefined;
      }
      if (state.inFlight) {
        pending.push(state.inFlight);
      }
    }
    await Promise.all(pending);
    this.logger.info("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): Record<string, JobStats> {
    const stats: Record<string, JobStats> = {};
    for (const [name, state] of this.jobs) {
      stats[name] = { ...state.stats };
    }
    return stats;
  }

  private arm(state: JobState): void {
    if (state.job.runOnStart) {
      this.tick(state);
    }
    state.timer = setInterval(() => this.tick(state), state.job.intervalMs);
  }

  private tick(state: JobState): void {
    if (!this.running) {
      return;
    }
    if (state.inFlight) {
      state.stats.skippedTicks += 1;
      return;
    }
    state.inFlight = this.execute(state).finally(() => {
      state.inFlight = undefined;
    });
  }

  private async execute(state: JobState): Promise<void> {
    const { job, stats } = state;
    stats.runs += 1;
    stats.lastRunAt = new Date().toISOString();
    try {
      await job.run();
    } catch (error: unknown) {
      const failure = toMonitorError(error);
      stats.failures += 1;
      stats.lastError = failure.message;
      this.logger.error(`Job ${job.name} failed`, {
        kind: failure.kind,
        error: failure.message,
      });
      this.onJobFailure?.(job.name, failure);
    }
  }
}
