import { describe, expect, it, vi } from "vitest";
import {
  type RecentTransactionSource,
  detectChanges,
  diffBalance,
  selectNewTransactions,
} from "./changeDetector";
import { MonitorError } from "./errors";
import type { AddressSnapshot, ClassifiedTransaction } from "./types";

const ADDRESS = "0x00000000000000000000000000000000000000aa";
const OTHER = "0x00000000000000000000000000000000000000bb";

const snapshot = (overrides: Partial<AddressSnapshot> = {}): AddressSnapshot => ({
  address: ADDRESS,
  balance: "1.0",
  transactionCount: 5,
  lastTxHash: "0xprev",
  lastTxBlock: 10,
  lastTxTimestamp: null,
  auxiliaryState: {},
  scanTime: "2024-01-01T00:00:00.000Z",
  ...overrides,
});

const tx = (hash: string, blockNumber: number): ClassifiedTransaction => ({
  hash,
  from: ADDRESS,
  to: OTHER,
  value: "0.25",
  blockNumber,
  timestamp: null,
  gasLimit: "21000",
  gasPrice: null,
  type: "transfer",
});

const sourceReturning = (transactions: ClassifiedTransaction[]) => ({
  fetchRecentTransactions: vi.fn(
    async (_address: string, _limit: number, _windowBlocks?: number) =>
      transactions,
  ),
});

describe("diffBalance", () => {
  it("returns nothing for numerically equal balances", () => {
    expect(diffBalance("1.0", "1.00")).toBeUndefined();
  });

  it("reports increases with a positive delta", () => {
    expect(diffBalance("1.0", "1.1")).toEqual({
      kind: "balance_increase",
      old: "1.0",
      new: "1.1",
      delta: "0.1",
    });
  });

  it("reports decreases with a negative delta", () => {
    expect(diffBalance("1.5", "1.0")).toEqual({
      kind: "balance_decrease",
      old: "1.5",
      new: "1.0",
      delta: "-0.5",
    });
  });

  it("throws on balances that are not decimals", () => {
    expect(() => diffBalance("abc", "1.0")).toThrow();
  });
});

describe("selectNewTransactions", () => {
  it("collects everything newer than the previous hash, oldest first", () => {
    const recent = [tx("0xc", 13), tx("0xb", 12), tx("0xprev", 10), tx("0xa", 9)];

    expect(selectNewTransactions(recent, "0xprev").map((t) => t.hash)).toEqual([
      "0xb",
      "0xc",
    ]);
  });

  it("keeps only the most recent few when the previous hash is not found", () => {
    const recent = [20, 19, 18, 17, 16, 15, 14].map((block) =>
      tx(`0x${block}`, block),
    );

    expect(selectNewTransactions(recent, "0xmissing").map((t) => t.blockNumber)).toEqual([
      16, 17, 18, 19, 20,
    ]);
  });

  it("treats a missing previous hash as unanchored", () => {
    const recent = [tx("0x2", 2), tx("0x1", 1)];

    expect(selectNewTransactions(recent, null, 1).map((t) => t.hash)).toEqual(["0x2"]);
  });

  it("returns nothing when the newest transaction is the previous one", () => {
    expect(selectNewTransactions([tx("0xprev", 10)], "0xprev")).toEqual([]);
  });
});

describe("detectChanges", () => {
  it("emits a single initial event for a first scan", async () => {
    const source = sourceReturning([]);
    const current = snapshot({ balance: "2.5", transactionCount: 3 });

    const events = await detectChanges(ADDRESS, null, current, source);

    expect(events).toEqual([
      { kind: "initial_monitor", balance: "2.5", transactionCount: 3 },
    ]);
    expect(source.fetchRecentTransactions).not.toHaveBeenCalled();
  });

  it("emits nothing when balance and count are unchanged", async () => {
    const source = sourceReturning([]);

    const events = await detectChanges(ADDRESS, snapshot(), snapshot(), source);

    expect(events).toEqual([]);
    expect(source.fetchRecentTransactions).not.toHaveBeenCalled();
  });

  it("puts the balance change ahead of new transactions", async () => {
    const source = sourceReturning([tx("0xc", 12), tx("0xb", 11), tx("0xprev", 10)]);
    const previous = snapshot();
    const current = snapshot({ balance: "0.5", transactionCount: 7 });

    const events = await detectChanges(ADDRESS, previous, current, source);

    expect(events.map((event) => event.kind)).toEqual([
      "balance_decrease",
      "new_transaction",
      "new_transaction",
    ]);
    expect(events[1]).toEqual({
      kind: "new_transaction",
      hash: "0xb",
      classifiedType: "transfer",
      amount: "0.25",
      from: ADDRESS,
      to: OTHER,
      block: 11,
    });
    expect(source.fetchRecentTransactions).toHaveBeenCalledWith(ADDRESS, 20, 20);
  });

  it("passes lookback options through to the source", async () => {
    const source = sourceReturning([]);

    await detectChanges(
      ADDRESS,
      snapshot(),
      snapshot({ transactionCount: 6 }),
      source,
      { lookbackLimit: 8, lookbackBlocks: 4 },
    );

    expect(source.fetchRecentTransactions).toHaveBeenCalledWith(ADDRESS, 8, 4);
  });

  it("caps unanchored lookups at five transactions", async () => {
    const recent = [30, 29, 28, 27, 26, 25].map((block) => tx(`0x${block}`, block));
    const source = sourceReturning(recent);

    const events = await detectChanges(
      ADDRESS,
      snapshot({ lastTxHash: "0xgone" }),
      snapshot({ transactionCount: 20 }),
      source,
    );

    expect(events).toHaveLength(5);
    expect(events.map((event) => (event.kind === "new_transaction" ? event.block : 0))).toEqual([
      26, 27, 28, 29, 30,
    ]);
  });

  it("reports a falling transaction count as an unknown change", async () => {
    const source = sourceReturning([]);

    const events = await detectChanges(
      ADDRESS,
      snapshot({ transactionCount: 5 }),
      snapshot({ transactionCount: 3 }),
      source,
    );

    expect(events).toEqual([
      {
        kind: "unknown",
        message: `Transaction count for ${ADDRESS} went from 5 to 3`,
      },
    ]);
    expect(source.fetchRecentTransactions).not.toHaveBeenCalled();
  });

  it("reports an unreadable balance as a single unknown change", async () => {
    const source = sourceReturning([]);

    const events = await detectChanges(
      ADDRESS,
      snapshot({ balance: "not-a-number" }),
      snapshot({ transactionCount: 9 }),
      source,
    );

    expect(events).toHaveLength(1);
    expect(events[0]?.kind).toBe("unknown");
    expect(source.fetchRecentTransactions).not.toHaveBeenCalled();
  });

  it("keeps the balance change when the lookback fails", async () => {
    const source: RecentTransactionSource = {
      fetchRecentTransactions: vi.fn(async () => {
        throw new MonitorError("rpc down", "TransientNetwork");
      }),
    };

    const events = await detectChanges(
      ADDRESS,
      snapshot(),
      snapshot({ balance: "2.0", transactionCount: 6 }),
      source,
    );

    expect(events).toEqual([
      { kind: "balance_increase", old: "1.0", new: "2.0", delta: "1.0" },
    ]);
  });
});
