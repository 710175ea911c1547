import type { ChainDataSource } from "./chainClient";
import type { CircuitBreaker } from "./circuitBreaker";
import { toMonitorError } from "./errors";
import type { ExchangeDataSource } from "./exchangeClient";
import { createLogger, type LoggerLike } from "./logger";
import type { RateLimiter } from "./rateLimiter";
import { type ErrorTracker, type RetryPolicy, withRetry } from "./retry";
import type {
  AddressSnapshot,
  ChainTransaction,
  ClassifiedTransaction,
  TransactionType,
} from "./types";
import { nowIso, toLowerAddress, unixToIso } from "./utils";

export interface SnapshotFetcherDeps {
  chain: ChainDataSource;
  exchange: ExchangeDataSource;
  rateLimiter: RateLimiter;
  breakers: { chain: CircuitBreaker; exchange: CircuitBreaker };
  retryPolicy: RetryPolicy;
  tracker: ErrorTracker;
  /** Default window for fetchRecentTransactions. */
  recentScanBlocks?: number;
  logger?: LoggerLike;
  clock?: () => string;
}

export const DEFAULT_RECENT_SCAN_BLOCKS = 10;

export const classifyTransaction = (
  tx: Pick<ChainTransaction, "from" | "to">,
  monitoredAddress: string,
): TransactionType => {
  const monitored = toLowerAddress(monitoredAddress);
  if (toLowerAddress(tx.from) === monitored) {
    return "transfer";
  }
  if (tx.to && toLowerAddress(tx.to) === monitored) {
    return "receive";
  }
  return "unknown";
};

const involves = (tx: ChainTransaction, address: string): boolean =>
  toLowerAddress(tx.from) === address ||
  (tx.to !== null && toLowerAddress(tx.to) === address);

/**
 * Builds composite snapshots from independent sources. A failing source
 * degrades its own fields to defaults; the snapshot itself is always returned.
 */
export class SnapshotFetcher {
  private readonly logger: LoggerLike;
  private readonly clock: () => string;

  constructor(private readonly deps: SnapshotFetcherDeps) {
    this.logger = deps.logger ?? createLogger("snapshot-fetcher");
    this.clock = deps.clock ?? nowIso;
  }

  async fetchSnapshot(rawAddress: string): Promise<AddressSnapshot> {
    const address = toLowerAddress(rawAddress);
    await this.deps.rateLimiter.wait();

    const { chain, exchange } = this.deps;
    const [balance, transactionCount, latestTx, userState] = await Promise.all([
      this.guarded("chain", "getBalance", address, "0", () =>
        chain.getBalance(address),
      ),
      this.guarded("chain", "getTransactionCount", address, 0, () =>
        chain.getTransactionCount(address),
      ),
      this.guarded("chain", "getLatestTransaction", address, null, () =>
        this.findLatestTransaction(address),
      ),
      this.guarded("exchange", "getUserState", address, null, () =>
        exchange.getUserState(address),
      ),
    ]);

    const auxiliaryState: Record<string, unknown> = {};
    if (userState !== null) {
      auxiliaryState.userState = userState;
    }
    if (latestTx !== null) {
      auxiliaryState.latestTransaction = latestTx;
    }

    return {
      address,
      balance,
      transactionCount,
      lastTxHash: latestTx?.hash ?? null,
      lastTxBlock: latestTx?.blockNumber ?? null,
      lastTxTimestamp:
        latestTx?.timestamp != null ? unixToIso(latestTx.timestamp) : null,
      auxiliaryState,
      scanTime: this.clock(),
    };
  }

  /**
   * Scans backwards from the chain head over `windowBlocks` blocks, returning
   * matches most-recent block first and stopping once `limit` are found.
   */
  async fetchRecentTransactions(
    rawAddress: string,
    limit: number,
    windowBlocks: number = this.deps.recentScanBlocks ??
      DEFAULT_RECENT_SCAN_BLOCKS,
  ): Promise<ClassifiedTransaction[]> {
    const address = toLowerAddress(rawAddress);
    const matches: ClassifiedTransaction[] = [];
    if (limit <= 0) {
      return matches;
    }

    await this.deps.rateLimiter.wait();

    let head: number;
    try {
      head = await this.call("chain", "getBlockNumber", () =>
        this.deps.chain.getBlockNumber(),
      );
    } catch (error: unknown) {
      const failure = toMonitorError(error);
      this.logger.error("Recent transaction scan aborted: chain head unavailable", {
        address,
        kind: failure.kind,
        error: failure.message,
      });
      return matches;
    }

    const lowest = Math.max(head - windowBlocks, 0);
    for (let blockNumber = head; blockNumber > lowest; blockNumber -= 1) {
      let transactions: ChainTransaction[];
      try {
        const block = await this.call("chain", "getBlock", () =>
          this.deps.chain.getBlock(blockNumber),
        );
        transactions = block?.transactions ?? [];
      } catch (error: unknown) {
        const failure = toMonitorError(error);
        this.logger.warn(`Skipping block ${blockNumber}`, {
          kind: failure.kind,
          error: failure.message,
        });
        continue;
      }

      for (const tx of transactions) {
        if (!involves(tx, address)) {
          continue;
        }
        matches.push({ ...tx, type: classifyTransaction(tx, address) });
        if (matches.length >= limit) {
          return matches;
        }
      }
    }

    return matches;
  }

  private async findLatestTransaction(
    address: string,
  ): Promise<ChainTransaction | null> {
    const block = await this.deps.chain.getBlock("latest");
    return block?.transactions.find((tx) => involves(tx, address)) ?? null;
  }

  private call<T>(
    source: "chain" | "exchange",
    operation: string,
    request: () => Promise<T>,
  ): Promise<T> {
    return this.deps.breakers[source].execute(() =>
      withRetry(this.deps.retryPolicy, request, {
        name: `${source}.${operation}`,
        tracker: this.deps.tracker,
        logger: this.logger,
      }),
    );
  }

  private async guarded<T>(
    source: "chain" | "exchange",
    operation: string,
    address: string,
    fallback: T,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await this.call(source, operation, request);
    } catch (error: unknown) {
      const failure = toMonitorError(error);
      this.logger.warn(`${source}.${operation} degraded to default`, {
        address,
        kind: failure.kind,
        error: failure.message,
      });
      return fallback;
    }
  }
}
