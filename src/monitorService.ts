import { AlertManager } from "./alerts";
import { EvmChainClient, type ChainDataSource } from "./chainClient";
import { CIRCUIT_PRESETS, CircuitBreaker } from "./circuitBreaker";
import { loadConfig, type MonitorConfig } from "./config";
import { ExchangeClient, type ExchangeDataSource } from "./exchangeClient";
import type { MonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";
import { AddressMonitor } from "./monitor";
import { NotificationDispatcher } from "./notificationDispatcher";
import { RateLimiter } from "./rateLimiter";
import { ErrorTracker, RETRY_POLICIES } from "./retry";
import { type JobStats, PeriodicScheduler } from "./scheduler";
import { LogSink, type NotificationSink, TelegramSink } from "./sinks";
import { SnapshotFetcher } from "./snapshotFetcher";
import { JsonStateStore, type MonitorStore } from "./stateStore";
import { errorMessage, hoursToMs } from "./utils";

export interface MonitorServiceOverrides {
  chain?: ChainDataSource;
  exchange?: ExchangeDataSource;
  store?: MonitorStore & { init?: () => Promise<void> };
  sink?: NotificationSink;
  alerts?: AlertManager;
  logger?: LoggerLike;
}

export interface HealthReport {
  storeReachable: boolean;
  activeAddresses: number | null;
  schedulerRunning: boolean;
  monitor: ReturnType<AddressMonitor["getStats"]>;
  dispatcher: ReturnType<NotificationDispatcher["getStats"]>;
  errors: ReturnType<ErrorTracker["getStats"]>;
  circuits: ReturnType<CircuitBreaker["getStats"]>[];
  alerts: ReturnType<AlertManager["getStats"]>;
}

export interface StatsReport {
  activeAddresses: number;
  jobs: Record<string, JobStats>;
  monitor: ReturnType<AddressMonitor["getStats"]>;
  dispatcher: ReturnType<NotificationDispatcher["getStats"]>;
  errors: ReturnType<ErrorTracker["getStats"]>;
}

/**
 * Owns every long-lived collaborator of a running monitor and the periodic
 * jobs that drive them.
 */
export class MonitorService {
  readonly tracker = new ErrorTracker();
  readonly alerts: AlertManager;
  readonly breakers: {
    chain: CircuitBreaker;
    exchange: CircuitBreaker;
    messaging: CircuitBreaker;
  };
  readonly store: MonitorStore & { init?: () => Promise<void> };
  readonly monitor: AddressMonitor;
  readonly dispatcher: NotificationDispatcher;
  readonly scheduler: PeriodicScheduler;
  private readonly logger: LoggerLike;

  constructor(
    private readonly config: MonitorConfig,
    overrides: MonitorServiceOverrides = {},
  ) {
    this.logger = overrides.logger ?? createLogger("service");
    this.alerts = overrides.alerts ?? new AlertManager();
    const onOpen = (name: string) => {
      this.alerts.raise(
        `circuit_open:${name}`,
        `Circuit ${name} opened after repeated failures`,
        "error",
      );
    };
    this.breakers = {
      chain: new CircuitBreaker({ ...CIRCUIT_PRESETS.rpc, onOpen }),
      exchange: new CircuitBreaker({ ...CIRCUIT_PRESETS.exchange, onOpen }),
      messaging: new CircuitBreaker({ ...CIRCUIT_PRESETS.messaging, onOpen }),
    };
    this.store =
      overrides.store ??
      new JsonStateStore({
        filePath: config.stateFile,
        defaultScanIntervalSeconds: config.defaultScanIntervalSeconds,
        maxAddressesPerUser: config.maxAddressesPerUser,
      });

    const fetcher = new SnapshotFetcher({
      chain:
        overrides.chain ??
        new EvmChainClient(config.rpcUrl, config.requestTimeoutMs),
      exchange:
        overrides.exchange ??
        new ExchangeClient(config.exchangeApiBase, config.requestTimeoutMs),
      rateLimiter: new RateLimiter(config.apiRateLimit),
      breakers: { chain: this.breakers.chain, exchange: this.breakers.exchange },
      retryPolicy: RETRY_POLICIES.network,
      tracker: this.tracker,
      recentScanBlocks: config.recentScanBlocks,
    });

    this.monitor = new AddressMonitor({
      store: this.store,
      fetcher,
      detectOptions: { lookbackBlocks: config.lookbackBlocks },
    });

    const sink =
      overrides.sink ??
      (config.telegramBotToken
        ? new TelegramSink(config.telegramBotToken, config.requestTimeoutMs)
        : new LogSink());
    this.dispatcher = new NotificationDispatcher({
      store: this.store,
      sink,
      batchSize: config.dispatchBatchSize,
      breaker: this.breakers.messaging,
    });

    this.scheduler = new PeriodicScheduler({
      onJobFailure: (jobName, failure) => this.onJobFailure(jobName, failure),
    });
    this.scheduler.addJob({
      name: "scan-addresses",
      intervalMs: config.baseTickSeconds * 1000,
      run: () => this.monitor.scanCycle(),
      runOnStart: true,
    });
    this.scheduler.addJob({
      name: "dispatch-notifications",
      intervalMs: config.dispatchIntervalSeconds * 1000,
      run: () => this.dispatcher.dispatchPending(),
    });
    this.scheduler.addJob({
      name: "cleanup",
      intervalMs: hoursToMs(config.cleanupIntervalHours),
      run: () => this.cleanup(),
    });
    this.scheduler.addJob({
      name: "health-check",
      intervalMs: config.healthCheckIntervalSeconds * 1000,
      run: () => this.healthCheck(),
    });
    this.scheduler.addJob({
      name: "stats-report",
      intervalMs: config.statsReportIntervalMinutes * 60_000,
      run: () => this.reportStats(),
    });
  }

  async start(): Promise<void> {
    await this.store.init?.();
    await this.seedWatchlist();
    this.scheduler.start();
    this.logger.info("Monitor service started", {
      watchlist: this.config.watchlist.length,
      baseTickSeconds: this.config.baseTickSeconds,
    });
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    this.logger.info("Monitor service stopped");
  }

  async cleanup(): Promise<void> {
    const result = await this.store.purgeOlderThan(this.config.retentionDays);
    if (!result.ok) {
      this.logger.error("Retention cleanup rejected", { reason: result.reason });
      return;
    }
    this.logger.info("Retention cleanup complete", {
      retentionDays: this.config.retentionDays,
      removedNotifications: result.removedNotifications,
      removedTransactions: result.removedTransactions,
    });
  }

  async healthCheck(): Promise<HealthReport> {
    let activeAddresses: number | null = null;
    try {
      activeAddresses = (await this.store.listActiveAddresses()).length;
    } catch (error: unknown) {
      this.logger.warn("Store unreachable during health check", {
        error: errorMessage(error),
      });
      this.alerts.raise("store_unreachable", errorMessage(error), "critical");
    }

    const report: HealthReport = {
      storeReachable: activeAddresses !== null,
      activeAddresses,
      schedulerRunning: this.scheduler.isRunning(),
      monitor: this.monitor.getStats(),
      dispatcher: this.dispatcher.getStats(),
      errors: this.tracker.getStats(),
      circuits: Object.values(this.breakers).map((breaker) =>
        breaker.getStats(),
      ),
      alerts: this.alerts.getStats(),
    };

    const openCircuits = report.circuits.filter(
      (circuit) => circuit.state !== "closed",
    );
    if (openCircuits.length) {
      this.logger.warn("Circuits not closed", {
        circuits: openCircuits.map((circuit) => `${circuit.name}:${circuit.state}`),
      });
    }
    this.logger.info("Health check", {
      storeReachable: report.storeReachable,
      activeAddresses: report.activeAddresses,
      totalScans: report.monitor.totalScans,
      scanErrors: report.monitor.errors,
      delivered: report.dispatcher.delivered,
      recoveryRate: report.errors.recoveryRate,
      jobs: this.scheduler.getStats(),
    });
    return report;
  }

  async reportStats(): Promise<StatsReport> {
    const report: StatsReport = {
      activeAddresses: (await this.store.listActiveAddresses()).length,
      jobs: this.scheduler.getStats(),
      monitor: this.monitor.getStats(),
      dispatcher: this.dispatcher.getStats(),
      errors: this.tracker.getStats(),
    };
    this.logger.info("Stats report", {
      activeAddresses: report.activeAddresses,
      uptimeSeconds: report.monitor.uptimeSeconds,
      totalScans: report.monitor.totalScans,
      notificationsQueued: report.monitor.notificationsQueued,
      delivered: report.dispatcher.delivered,
      errorRate24h: report.errors.errorRate24h,
      jobs: report.jobs,
    });
    return report;
  }

  private onJobFailure(jobName: string, failure: MonitorError): void {
    if (failure.kind === "Fatal") {
      this.alerts.raise(`job_failed:${jobName}`, failure.message, "critical");
    }
  }

  private async seedWatchlist(): Promise<void> {
    for (const entry of this.config.watchlist) {
      await this.store.addUser(entry.userId);
      const added = await this.store.addMonitoredAddress(
        entry.userId,
        entry.address,
        entry.label,
      );
      if (added) {
        this.logger.info("Watching address", {
          userId: entry.userId,
          address: entry.address,
        });
      }
    }
  }
}

export const startMonitorService = async (
  overrides: MonitorServiceOverrides = {},
): Promise<MonitorService> => {
  const config = await loadConfig();
  const service = new MonitorService(config, overrides);
  await service.start();
  return service;
};
