import { createLogger, type LoggerLike } from "./logger";
import { hoursToMs } from "./utils";

export type AlertSeverity = "info" | "warning" | "error" | "critical";

export interface AlertRecord {
  type: string;
  severity: AlertSeverity;
  message: string;
  raisedAt: string;
}

export interface AlertStats {
  raised: number;
  suppressed: number;
  lastAlert: AlertRecord | null;
}

export interface AlertManagerOptions {
  cooldownMs?: number;
  now?: () => number;
  logger?: LoggerLike;
}

export const ALERT_COOLDOWN_MS = hoursToMs(1);

const SEVERITY_MARKERS: Record<AlertSeverity, string> = {
  info: "[INFO]",
  warning: "[WARNING]",
  error: "[ERROR]",
  critical: "[CRITICAL]",
};

/**
 * Operator alerts written to the log. Each alert type is raised at most once
 * per cooldown window; repeats inside the window are counted and dropped.
 */
export class AlertManager {
  private readonly lastRaisedAt = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly logger: LoggerLike;
  private raised = 0;
  private suppressed = 0;
  private lastAlert: AlertRecord | null = null;

  constructor(options: AlertManagerOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? ALERT_COOLDOWN_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger("alerts");
  }

  /** Returns false when the alert was dropped because its type is cooling down. */
  raise(type: string, message: string, severity: AlertSeverity = "warning"): boolean {
    const now = this.now();
    if (this.isInCooldown(type, now)) {
      this.suppressed += 1;
      return false;
    }
    this.lastRaisedAt.set(type, now);
    this.raised += 1;
    this.lastAlert = {
      type,
      severity,
      message,
      raisedAt: new Date(now).toISOString(),
    };

    const text = `${SEVERITY_MARKERS[severity]} ${type}: ${message}`;
    if (severity === "critical" || severity === "error") {
      this.logger.error(text, { alert: type, severity });
    } else if (severity === "warning") {
      this.logger.warn(text, { alert: type, severity });
    } else {
      this.logger.info(text, { alert: type, severity });
    }
    return true;
  }

  isInCooldown(type: string, now: number = this.now()): boolean {
    const last = this.lastRaisedAt.get(type);
    return last !== undefined && now - last < this.cooldownMs;
  }

  getStats(): AlertStats {
    return {
      raised: this.raised,
      suppressed: this.suppressed,
      lastAlert: this.lastAlert ? { ...this.lastAlert } : null,
    };
  }
}
