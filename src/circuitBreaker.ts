import {
  CircuitOpenError,
  type FailureKind,
  classifyFailure,
} from "./errors";
import { createLogger, type LoggerLike } from "./logger";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  recoveryTimeoutMs: number;
  /** Failure kinds that count against the circuit; others pass through untouched. */
  tripOn?: readonly FailureKind[];
  now?: () => number;
  logger?: LoggerLike;
  /** Called each time the circuit transitions into the open state. */
  onOpen?: (name: string) => void;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  rejectedCalls: number;
  totalCalls: number;
}

export const CIRCUIT_PRESETS = {
  rpc: { name: "rpc", failureThreshold: 10, recoveryTimeoutMs: 60_000 },
  exchange: { name: "exchange", failureThreshold: 15, recoveryTimeoutMs: 120_000 },
  messaging: { name: "messaging", failureThreshold: 5, recoveryTimeoutMs: 30_000 },
} as const satisfies Record<string, CircuitBreakerOptions>;

/**
 * closed -> open once failures reach the threshold; open -> half-open after the
 * recovery timeout; half-open -> closed on the next success or back to open on
 * the next failure. Concurrent calls arriving while half-open are all let through.
 */
export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private rejectedCalls = 0;
  private totalCalls = 0;
  private readonly tripOn: readonly FailureKind[];
  private readonly now: () => number;
  private readonly logger: LoggerLike;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.tripOn = options.tripOn ?? ["TransientNetwork"];
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger(`circuit:${options.name}`);
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.totalCalls += 1;
    if (!this.canExecute()) {
      this.rejectedCalls += 1;
      throw new CircuitOpenError(this.options.name);
    }

    let result: T;
    try {
      result = await operation();
    } catch (error: unknown) {
      if (this.tripOn.includes(classifyFailure(error))) {
        this.onFailure();
      }
      throw error;
    }
    this.onSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.options.name,
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      rejectedCalls: this.rejectedCalls,
      totalCalls: this.totalCalls,
    };
  }

  reset(): void {
    this.state = "closed";
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.logger.info("Circuit reset");
  }

  private canExecute(): boolean {
    if (this.state !== "open") {
      return true;
    }
    const since =
      this.lastFailureTime === null
        ? Number.POSITIVE_INFINITY
        : this.now() - this.lastFailureTime;
    if (since >= this.options.recoveryTimeoutMs) {
      this.state = "half-open";
      this.logger.info("Circuit half-open, probing dependency");
      return true;
    }
    return false;
  }

  private onSuccess(): void {
    if (this.state === "half-open") {
      this.state = "closed";
      this.failureCount = 0;
      this.logger.info("Circuit closed, dependency recovered");
      return;
    }
    this.failureCount = Math.max(0, this.failureCount - 1);
  }

  private onFailure(): void {
    this.failureCount += 1;
    this.lastFailureTime = this.now();
    if (
      this.state === "half-open" ||
      this.failureCount >= this.options.failureThreshold
    ) {
      if (this.state === "open") {
        return;
      }
      this.state = "open";
      this.logger.warn("Circuit opened", {
        failures: this.failureCount,
        recoveryTimeoutMs: this.options.recoveryTimeoutMs,
      });
      this.options.onOpen?.(this.options.name);
    }
  }
}
