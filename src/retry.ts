import { type FailureKind, MonitorError, toMonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";
import { delay, nowIso } from "./utils";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly exponentialBase: number;
  readonly jitter: boolean;
  readonly retryOn: readonly FailureKind[];
}

export const RETRY_POLICIES = {
  network: {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    exponentialBase: 2,
    jitter: true,
    retryOn: ["TransientNetwork"],
  },
  api: {
    maxAttempts: 3,
    baseDelayMs: 2000,
    maxDelayMs: 10000,
    exponentialBase: 2,
    jitter: true,
    retryOn: ["TransientNetwork"],
  },
  storage: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 5000,
    exponentialBase: 2,
    jitter: true,
    retryOn: ["TransientNetwork", "DataUnavailable"],
  },
} as const satisfies Record<string, RetryPolicy>;

export interface FailureRecord {
  operation: string;
  kind: FailureKind;
  message: string;
  attempt: number;
  timestamp: string;
}

export interface ErrorStats {
  totalFailures: number;
  retried: number;
  recovered: number;
  fatal: number;
  lastFailureAt: string | null;
  recentFailures: number;
  /** Percentage of failures that were followed by a successful attempt. */
  recoveryRate: number;
  /** Share of the retained history, in percent, recorded in the last 24 hours. */
  errorRate24h: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Failure counters and a bounded history of recent failures. One instance is
 * built per service and handed to everything that retries.
 */
export class ErrorTracker {
  private records: FailureRecord[] = [];
  private totalFailures = 0;
  private retried = 0;
  private recovered = 0;
  private fatal = 0;
  private lastFailureAt: string | null = null;

  constructor(
    private readonly capacity: number = 100,
    private readonly clock: () => string = nowIso,
  ) {}

  recordFailure(record: Omit<FailureRecord, "timestamp">): FailureRecord {
    const entry: FailureRecord = { ...record, timestamp: this.clock() };
    this.totalFailures += 1;
    this.lastFailureAt = entry.timestamp;
    this.records.push(entry);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
    return entry;
  }

  recordRetry(): void {
    this.retried += 1;
  }

  recordRecovery(): void {
    this.recovered += 1;
  }

  recordFatal(): void {
    this.fatal += 1;
  }

  getRecentFailures(limit = 10): FailureRecord[] {
    return limit > 0 ? this.records.slice(-limit) : [];
  }

  getStats(): ErrorStats {
    return {
      totalFailures: this.totalFailures,
      retried: this.retried,
      recovered: this.recovered,
      fatal: this.fatal,
      lastFailureAt: this.lastFailureAt,
      recentFailures: this.records.length,
      recoveryRate:
        this.totalFailures === 0
          ? 100
          : (this.recovered / this.totalFailures) * 100,
      errorRate24h: this.errorRate24h(),
    };
  }

  clear(): void {
    this.records = [];
  }

  private errorRate24h(): number {
    if (this.lastFailureAt === null) {
      return 0;
    }
    const cutoff = Date.parse(this.clock()) - DAY_MS;
    const recent = this.records.filter(
      (record) => Date.parse(record.timestamp) > cutoff,
    ).length;
    return (recent / Math.max(this.records.length, 1)) * 100;
  }
}

/**
 * Delay before the attempt following `attempt` (1-based):
 * `min(maxDelay, base * exponentialBase^(attempt - 1))`, scaled into
 * [0.5, 1.0] of itself when jitter is on.
 */
export const computeRetryDelay = (
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number => {
  const exponential =
    policy.baseDelayMs * policy.exponentialBase ** (attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  return policy.jitter ? capped * (0.5 + random() * 0.5) : capped;
};

export interface RetryOptions<T> {
  name: string;
  tracker?: ErrorTracker;
  fallback?: () => Promise<T>;
  logger?: LoggerLike;
  onRetry?: (attempt: number, failure: MonitorError, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultLogger = createLogger("retry");

export const withRetry = async <T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<T> => {
  const { name, tracker, fallback, onRetry } = options;
  const logger = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? delay;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        tracker?.recordRecovery();
        logger.info(`${name} recovered on attempt ${attempt}`);
      }
      return result;
    } catch (error: unknown) {
      const failure = toMonitorError(error);
      tracker?.recordFailure({
        operation: name,
        kind: failure.kind,
        message: failure.message,
        attempt,
      });

      if (!policy.retryOn.includes(failure.kind)) {
        logger.error(`${name} failed with non-retried ${failure.kind}`, {
          error: failure.message,
          attempt,
        });
        throw failure;
      }

      if (attempt >= maxAttempts) {
        tracker?.recordFatal();
        logger.error(`${name} still failing after ${maxAttempts} attempts`, {
          kind: failure.kind,
          error: failure.message,
        });
        if (fallback) {
          return fallback();
        }
        throw failure;
      }

      const delayMs = computeRetryDelay(policy, attempt, options.random);
      tracker?.recordRetry();
      logger.warn(
        `${name} attempt ${attempt} failed, retrying in ${Math.round(delayMs)}ms`,
        { kind: failure.kind, error: failure.message },
      );
      onRetry?.(attempt, failure, delayMs);
      await sleep(delayMs);
    }
  }
};
