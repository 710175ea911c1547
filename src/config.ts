import path from "path";
import dotenv from "dotenv";
import { MonitorError } from "./errors";
import { MAX_TIMER_DELAY_MS } from "./scheduler";
import { ensureDirectory, hoursToMs, toLowerAddress } from "./utils";

dotenv.config();

export interface WatchlistEntry {
  userId: number;
  address: string;
  label?: string;
}

export interface MonitorConfig {
  rpcUrl: string;
  exchangeApiBase: string;
  dataDir: string;
  stateFile: string;
  defaultScanIntervalSeconds: number;
  maxAddressesPerUser: number;
  apiRateLimit: number;
  requestTimeoutMs: number;
  baseTickSeconds: number;
  dispatchIntervalSeconds: number;
  dispatchBatchSize: number;
  healthCheckIntervalSeconds: number;
  cleanupIntervalHours: number;
  statsReportIntervalMinutes: number;
  retentionDays: number;
  lookbackBlocks: number;
  recentScanBlocks: number;
  telegramBotToken?: string;
  watchlist: WatchlistEntry[];
}

const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** Parses `userId:address[:label]` entries separated by commas. */
export const parseWatchlist = (raw: string | undefined): WatchlistEntry[] => {
  if (!raw?.trim()) {
    return [];
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => {
      const [userPart = "", addressPart = "", ...labelParts] = item.split(":");
      const userId = Number(userPart);
      if (!Number.isInteger(userId) || !ADDRESS_PATTERN.test(addressPart)) {
        throw new MonitorError(`Invalid watchlist entry "${item}"`, "Fatal");
      }
      const label = labelParts.join(":").trim();
      return {
        userId,
        address: toLowerAddress(addressPart),
        ...(label ? { label } : {}),
      };
    });
};

export const validateConfig = (config: MonitorConfig): MonitorConfig => {
  const positive: Array<keyof MonitorConfig> = [
    "defaultScanIntervalSeconds",
    "maxAddressesPerUser",
    "apiRateLimit",
    "requestTimeoutMs",
    "baseTickSeconds",
    "dispatchIntervalSeconds",
    "dispatchBatchSize",
    "healthCheckIntervalSeconds",
    "cleanupIntervalHours",
    "statsReportIntervalMinutes",
    "lookbackBlocks",
    "recentScanBlocks",
  ];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== "number" || !(value > 0)) {
      throw new MonitorError(
        `Configuration ${key} must be a positive number`,
        "Fatal",
      );
    }
  }
  const timerIntervals: Array<[keyof MonitorConfig, number]> = [
    ["baseTickSeconds", config.baseTickSeconds * 1000],
    ["dispatchIntervalSeconds", config.dispatchIntervalSeconds * 1000],
    ["healthCheckIntervalSeconds", config.healthCheckIntervalSeconds * 1000],
    ["cleanupIntervalHours", hoursToMs(config.cleanupIntervalHours)],
    ["statsReportIntervalMinutes", config.statsReportIntervalMinutes * 60_000],
  ];
  for (const [key, intervalMs] of timerIntervals) {
    if (intervalMs > MAX_TIMER_DELAY_MS) {
      throw new MonitorError(
        `Configuration ${key} exceeds the longest supported timer interval`,
        "Fatal",
      );
    }
  }
  if (
    !Number.isInteger(config.retentionDays) ||
    config.retentionDays < 1 ||
    config.retentionDays > 365
  ) {
    throw new MonitorError(
      "Configuration retentionDays must be an integer between 1 and 365",
      "Fatal",
    );
  }
  return config;
};

export const loadConfig = async (): Promise<MonitorConfig> => {
  const dataDir =
    process.env.MONITOR_DATA_DIR ?? path.join(process.cwd(), "data");
  await ensureDirectory(dataDir);

  const stateFile =
    process.env.STATE_FILE ?? path.join(dataDir, "monitor-state.json");
  const telegramBotToken = process.env.TELEGRAM_BOT_TOKEN?.trim();

  const baseConfig: MonitorConfig = {
    rpcUrl:
      process.env.HYPERLIQUID_RPC_URL ?? "https://rpc.hyperliquid.xyz/evm",
    exchangeApiBase:
      process.env.HYPERLIQUID_API_BASE ?? "https://api.hyperliquid.xyz",
    dataDir,
    stateFile,
    defaultScanIntervalSeconds: parseNumber(
      process.env.DEFAULT_SCAN_INTERVAL,
      60,
    ),
    maxAddressesPerUser: parseNumber(process.env.MAX_ADDRESSES_PER_USER, 20),
    apiRateLimit: parseNumber(process.env.API_RATE_LIMIT, 2),
    requestTimeoutMs: parseNumber(process.env.REQUEST_TIMEOUT_MS, 10000),
    baseTickSeconds: parseNumber(process.env.BASE_TICK_SECONDS, 10),
    dispatchIntervalSeconds: parseNumber(
      process.env.DISPATCH_INTERVAL_SECONDS,
      10,
    ),
    dispatchBatchSize: parseNumber(process.env.DISPATCH_BATCH_SIZE, 50),
    healthCheckIntervalSeconds: parseNumber(
      process.env.HEALTH_CHECK_INTERVAL_SECONDS,
      300,
    ),
    cleanupIntervalHours: parseNumber(process.env.CLEANUP_INTERVAL_HOURS, 24),
    statsReportIntervalMinutes: parseNumber(
      process.env.STATS_REPORT_INTERVAL_MINUTES,
      60,
    ),
    retentionDays: parseNumber(process.env.RETENTION_DAYS, 30),
    lookbackBlocks: parseNumber(process.env.LOOKBACK_BLOCKS, 20),
    recentScanBlocks: parseNumber(process.env.RECENT_SCAN_BLOCKS, 10),
    watchlist: parseWatchlist(process.env.WATCHLIST),
  };

  const config = telegramBotToken
    ? { ...baseConfig, telegramBotToken }
    : baseConfig;
  return validateConfig(config);
};
