import { describe, expect, it } from "vitest";
import { type MonitorConfig, parseWatchlist, validateConfig } from "./config";

const FIRST = "0x00000000000000000000000000000000000000AA";
const SECOND = "0x00000000000000000000000000000000000000bb";

const baseConfig = (): MonitorConfig => ({
  rpcUrl: "http://localhost:8545",
  exchangeApiBase: "http://localhost:3001",
  dataDir: "data",
  stateFile: "data/monitor-state.json",
  defaultScanIntervalSeconds: 60,
  maxAddressesPerUser: 20,
  apiRateLimit: 2,
  requestTimeoutMs: 10000,
  baseTickSeconds: 10,
  dispatchIntervalSeconds: 10,
  dispatchBatchSize: 50,
  healthCheckIntervalSeconds: 300,
  cleanupIntervalHours: 24,
  statsReportIntervalMinutes: 60,
  retentionDays: 30,
  lookbackBlocks: 20,
  recentScanBlocks: 10,
  watchlist: [],
});

describe("parseWatchlist", () => {
  it("returns nothing for an empty value", () => {
    expect(parseWatchlist(undefined)).toEqual([]);
    expect(parseWatchlist("  ")).toEqual([]);
  });

  it("parses users, lowercased addresses and optional labels", () => {
    expect(parseWatchlist(`1:${FIRST}:Cold storage, 2:${SECOND},`)).toEqual([
      { userId: 1, address: FIRST.toLowerCase(), label: "Cold storage" },
      { userId: 2, address: SECOND },
    ]);
  });

  it("keeps colons inside labels", () => {
    expect(parseWatchlist(`3:${SECOND}:desk: main`)).toEqual([
      { userId: 3, address: SECOND, label: "desk: main" },
    ]);
  });

  it.each([
    `x:${SECOND}`,
    "1:0x1234",
    `1.5:${SECOND}`,
    SECOND,
  ])("rejects %s", (raw) => {
    expect(() => parseWatchlist(raw)).toThrow(/Invalid watchlist entry/);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    const config = baseConfig();

    expect(validateConfig(config)).toBe(config);
  });

  it("rejects non-positive intervals", () => {
    expect(() => validateConfig({ ...baseConfig(), baseTickSeconds: 0 })).toThrow(
      "Configuration baseTickSeconds must be a positive number",
    );
  });

  it.each<[string, Partial<MonitorConfig>]>([
    ["cleanupIntervalHours", { cleanupIntervalHours: 720 }],
    ["baseTickSeconds", { baseTickSeconds: 2_147_484 }],
    ["statsReportIntervalMinutes", { statsReportIntervalMinutes: 40_000 }],
  ])("rejects a %s longer than a timer can wait", (key, override) => {
    expect(() => validateConfig({ ...baseConfig(), ...override })).toThrow(
      `Configuration ${key} exceeds the longest supported timer interval`,
    );
  });

  it("accepts a cleanup interval of 24 days", () => {
    const config = { ...baseConfig(), cleanupIntervalHours: 24 * 24 };

    expect(validateConfig(config)).toBe(config);
  });

  it.each([0, 366, 7.5])("rejects retentionDays of %s", (retentionDays) => {
    expect(() => validateConfig({ ...baseConfig(), retentionDays })).toThrow(
      "Configuration retentionDays must be an integer between 1 and 365",
    );
  });
});
