import type { CircuitBreaker } from "./circuitBreaker";
import { toMonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";
import type { NotificationSink } from "./sinks";
import type { MonitorStore } from "./stateStore";

export interface DispatchResult {
  attempted: number;
  delivered: number;
  failed: number;
}

export interface DispatcherStats {
  cycles: number;
  delivered: number;
  failed: number;
}

export interface NotificationDispatcherDeps {
  store: MonitorStore;
  sink: NotificationSink;
  batchSize: number;
  breaker?: CircuitBreaker;
  logger?: LoggerLike;
}

/**
 * Drains the pending queue once per tick. Undelivered rows stay pending and are
 * retried on the next tick.
 */
export class NotificationDispatcher {
  private readonly logger: LoggerLike;
  private stats: DispatcherStats = { cycles: 0, delivered: 0, failed: 0 };

  constructor(private readonly deps: NotificationDispatcherDeps) {
    this.logger = deps.logger ?? createLogger("dispatcher");
  }

  async dispatchPending(): Promise<DispatchResult> {
    const pending = await this.deps.store.listPendingNotifications(
      this.deps.batchSize,
    );
    const result: DispatchResult = {
      attempted: pending.length,
      delivered: 0,
      failed: 0,
    };
    this.stats.cycles += 1;
    if (!pending.length) {
      return result;
    }

    this.logger.info(`Dispatching ${pending.length} pending notifications`);
    for (const notification of pending) {
      try {
        const delivered = await this.send(notification.userId, notification.message);
        if (!delivered) {
          throw new Error("sink refused message");
        }
        await this.deps.store.markSent(notification.id);
        result.delivered += 1;
      } catch (error: unknown) {
        result.failed += 1;
        this.logger.error(`Notification ${notification.id} not delivered`, {
          userId: notification.userId,
          error: toMonitorError(error).message,
        });
      }
    }

    this.stats.delivered += result.delivered;
    this.stats.failed += result.failed;
    return result;
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private send(userId: number, text: string): Promise<boolean> {
    const { sink, breaker } = this.deps;
    return breaker
      ? breaker.execute(() => sink.deliver(userId, text))
      : sink.deliver(userId, text);
  }
}
