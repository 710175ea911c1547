import { toMonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";
import type {
  AddressSnapshot,
  BalanceChangeEvent,
  ChangeEvent,
  ClassifiedTransaction,
  NewTransactionEvent,
} from "./types";
import { formatDecimal, parseDecimal } from "./utils";

export interface RecentTransactionSource {
  fetchRecentTransactions(
    address: string,
    limit: number,
    windowBlocks?: number,
  ): Promise<ClassifiedTransaction[]>;
}

export interface DetectOptions {
  /** Transactions requested from the recent-transaction window. */
  lookbackLimit?: number;
  /** Blocks scanned backwards when looking for new transactions. */
  lookbackBlocks?: number;
  /** Cap on reported transactions when the previous hash is not in the window. */
  maxUnanchored?: number;
  logger?: LoggerLike;
}

export const DEFAULT_LOOKBACK_LIMIT = 20;
export const DEFAULT_LOOKBACK_BLOCKS = 20;
export const MAX_UNANCHORED_TRANSACTIONS = 5;

const defaultLogger = createLogger("change-detector");

/**
 * Balance comparison at 18-decimal precision. Returns undefined when the
 * balances are numerically equal.
 */
export const diffBalance = (
  oldBalance: string,
  newBalance: string,
): BalanceChangeEvent | undefined => {
  const before = parseDecimal(oldBalance);
  const after = parseDecimal(newBalance);
  if (before.eq(after)) {
    return undefined;
  }
  const delta = after.sub(before);
  return {
    kind: delta.isNegative() ? "balance_decrease" : "balance_increase",
    old: oldBalance,
    new: newBalance,
    delta: formatDecimal(delta),
  };
};

/**
 * Walks `recent` (most recent first) collecting transactions until the one
 * matching `previousHash` is reached. When it never is, only the
 * `maxUnanchored` most recent are kept. Result is oldest block first.
 */
export const selectNewTransactions = (
  recent: readonly ClassifiedTransaction[],
  previousHash: string | null,
  maxUnanchored: number = MAX_UNANCHORED_TRANSACTIONS,
): ClassifiedTransaction[] => {
  const collected: ClassifiedTransaction[] = [];
  let anchored = false;
  for (const tx of recent) {
    if (previousHash && tx.hash === previousHash) {
      anchored = true;
      break;
    }
    collected.push(tx);
  }
  const kept = anchored ? collected : collected.slice(0, maxUnanchored);
  return kept.sort((a, b) => a.blockNumber - b.blockNumber);
};

const toTransactionEvent = (tx: ClassifiedTransaction): NewTransactionEvent => ({
  kind: "new_transaction",
  hash: tx.hash,
  classifiedType: tx.type,
  amount: tx.value,
  from: tx.from,
  to: tx.to,
  block: tx.blockNumber,
});

/**
 * Diffs two snapshots of one address. Order is fixed: the balance change first,
 * then new transactions oldest first. Never rejects.
 */
export const detectChanges = async (
  address: string,
  previous: AddressSnapshot | null,
  current: AddressSnapshot,
  source: RecentTransactionSource,
  options: DetectOptions = {},
): Promise<ChangeEvent[]> => {
  if (!previous) {
    return [
      {
        kind: "initial_monitor",
        balance: current.balance,
        transactionCount: current.transactionCount,
      },
    ];
  }

  const logger = options.logger ?? defaultLogger;
  const events: ChangeEvent[] = [];

  try {
    const balanceChange = diffBalance(previous.balance, current.balance);
    if (balanceChange) {
      events.push(balanceChange);
    }
  } catch (error: unknown) {
    return [
      {
        kind: "unknown",
        message: `Unreadable balance for ${address} (${previous.balance} -> ${current.balance}): ${toMonitorError(error, "Validation").message}`,
      },
    ];
  }

  const newCount = current.transactionCount - previous.transactionCount;
  if (newCount < 0) {
    events.push({
      kind: "unknown",
      message: `Transaction count for ${address} went from ${previous.transactionCount} to ${current.transactionCount}`,
    });
    return events;
  }
  if (newCount === 0) {
    return events;
  }

  let recent: ClassifiedTransaction[];
  try {
    recent = await source.fetchRecentTransactions(
      address,
      options.lookbackLimit ?? DEFAULT_LOOKBACK_LIMIT,
      options.lookbackBlocks ?? DEFAULT_LOOKBACK_BLOCKS,
    );
  } catch (error: unknown) {
    logger.warn("Lookback window unavailable; new transactions not itemised", {
      address,
      newCount,
      error: toMonitorError(error).message,
    });
    return events;
  }

  const fresh = selectNewTransactions(
    recent,
    previous.lastTxHash,
    options.maxUnanchored ?? MAX_UNANCHORED_TRANSACTIONS,
  );
  logger.debug("Resolved new transactions", {
    address,
    newCount,
    itemised: fresh.length,
  });
  events.push(...fresh.map(toTransactionEvent));
  return events;
};
