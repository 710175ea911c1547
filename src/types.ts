export type TransactionType = "transfer" | "receive" | "unknown";

export interface ChainTransaction {
  hash: string;
  from: string;
  to: string | null;
  /** Value in ether units, decimal string. */
  value: string;
  blockNumber: number;
  /** Block timestamp in unix seconds, when the block was read with it. */
  timestamp: number | null;
  gasLimit: string;
  gasPrice: string | null;
}

export interface ClassifiedTransaction extends ChainTransaction {
  type: TransactionType;
}

export interface ChainBlock {
  number: number;
  timestamp: number;
  transactions: ChainTransaction[];
}

/**
 * Observed state of one address at the end of a scan. Never mutated: each scan
 * produces a fresh value that replaces the stored one.
 */
export interface AddressSnapshot {
  readonly address: string;
  readonly balance: string;
  readonly transactionCount: number;
  readonly lastTxHash: string | null;
  readonly lastTxBlock: number | null;
  readonly lastTxTimestamp: string | null;
  readonly auxiliaryState: Readonly<Record<string, unknown>>;
  readonly scanTime: string;
}

export interface InitialMonitorEvent {
  kind: "initial_monitor";
  balance: string;
  transactionCount: number;
}

export interface BalanceChangeEvent {
  kind: "balance_increase" | "balance_decrease";
  old: string;
  new: string;
  delta: string;
}

export interface NewTransactionEvent {
  kind: "new_transaction";
  hash: string;
  classifiedType: TransactionType;
  amount: string;
  from: string;
  to: string | null;
  block: number;
}

export interface UnknownChangeEvent {
  kind: "unknown";
  message: string;
}

export type ChangeEvent =
  | InitialMonitorEvent
  | BalanceChangeEvent
  | NewTransactionEvent
  | UnknownChangeEvent;

export type ChangeKind = ChangeEvent["kind"];

export interface UserRecord {
  userId: number;
  username?: string;
  scanIntervalSeconds: number;
  createdAt: string;
  active: boolean;
}

export interface MonitoredAddress {
  userId: number;
  address: string;
  label?: string;
  createdAt: string;
  active: boolean;
}

export interface NotificationRecord {
  id: number;
  userId: number;
  address: string;
  txHash: string;
  kind: ChangeKind;
  message: string;
  sent: boolean;
  sentAt: string | null;
  createdAt: string;
}

export interface TransactionRecord {
  address: string;
  txHash: string;
  type: TransactionType;
  amount: string;
  from: string;
  to: string | null;
  blockNumber: number;
  createdAt: string;
}

export interface MonitorStateData {
  users: Record<string, UserRecord>;
  addresses: MonitoredAddress[];
  snapshots: Record<string, AddressSnapshot>;
  transactions: TransactionRecord[];
  notifications: NotificationRecord[];
  nextNotificationId: number;
}
