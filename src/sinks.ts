import { MonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";

export interface NotificationSink {
  /** Resolves true once the message is accepted by the messaging service. */
  deliver(userId: number, text: string): Promise<boolean>;
}

interface TelegramResponse {
  ok?: boolean;
  description?: string;
}

const isTelegramResponse = (value: unknown): value is TelegramResponse =>
  typeof value === "object" && value !== null && "ok" in value;

export class TelegramSink implements NotificationSink {
  private readonly logger: LoggerLike;

  constructor(
    private readonly botToken: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch,
    logger?: LoggerLike,
  ) {
    this.logger = logger ?? createLogger("telegram-sink");
  }

  async deliver(userId: number, text: string): Promise<boolean> {
    const response = await this.fetchImpl(
      `https://api.telegram.org/bot${this.botToken}/sendMessage`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: userId,
          text,
          parse_mode: "Markdown",
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      },
    );

    if (response.status === 429 || response.status >= 500) {
      throw new MonitorError(
        `Telegram request failed with status ${response.status}`,
        "TransientNetwork",
      );
    }

    const payload: unknown = await response.json().catch(() => undefined);
    if (!response.ok || !isTelegramResponse(payload) || payload.ok !== true) {
      this.logger.warn("Telegram rejected message", {
        userId,
        status: response.status,
        description: isTelegramResponse(payload) ? payload.description : undefined,
      });
      return false;
    }
    return true;
  }
}

/** Writes notifications to the log; used when no bot token is configured. */
export class LogSink implements NotificationSink {
  constructor(private readonly logger: LoggerLike = createLogger("log-sink")) {}

  async deliver(userId: number, text: string): Promise<boolean> {
    this.logger.info(`Notification for ${userId}\n${text}`);
    return true;
  }
}
