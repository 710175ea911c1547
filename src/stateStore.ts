import { z } from "zod";
import { MonitorError } from "./errors";
import { Mutex } from "./rateLimiter";
import type {
  AddressSnapshot,
  ChangeKind,
  MonitorStateData,
  MonitoredAddress,
  NotificationRecord,
  TransactionRecord,
  UserRecord,
} from "./types";
import {
  daysToMs,
  readJsonFile,
  toLowerAddress,
  writeJsonFile,
} from "./utils";

export type PurgeResult =
  | { ok: true; removedNotifications: number; removedTransactions: number }
  | { ok: false; reason: string };

export interface NewNotification {
  userId: number;
  address: string;
  txHash: string;
  kind: ChangeKind;
  message: string;
}

/**
 * Persistence collaborator of the monitor: snapshots keyed by address, the
 * watchlist, and the append-only notification queue.
 */
export interface MonitorStore {
  getSnapshot(address: string): Promise<AddressSnapshot | null>;
  putSnapshot(address: string, snapshot: AddressSnapshot): Promise<void>;
  listActiveAddresses(): Promise<string[]>;
  listMonitoredAddresses(): Promise<MonitoredAddress[]>;
  getUserInterval(userId: number): Promise<number>;
  setUserInterval(userId: number, seconds: number): Promise<boolean>;
  addUser(userId: number, username?: string): Promise<UserRecord>;
  addMonitoredAddress(
    userId: number,
    address: string,
    label?: string,
  ): Promise<boolean>;
  removeMonitoredAddress(userId: number, address: string): Promise<boolean>;
  enqueueNotification(notification: NewNotification): Promise<NotificationRecord>;
  listPendingNotifications(limit: number): Promise<NotificationRecord[]>;
  markSent(id: number): Promise<boolean>;
  recordTransaction(record: Omit<TransactionRecord, "createdAt">): Promise<boolean>;
  listTransactions(address: string): Promise<TransactionRecord[]>;
  purgeOlderThan(days: unknown): Promise<PurgeResult>;
}

const changeKindSchema = z.enum([
  "initial_monitor",
  "balance_increase",
  "balance_decrease",
  "new_transaction",
  "unknown",
]);

const transactionTypeSchema = z.enum(["transfer", "receive", "unknown"]);

const snapshotSchema = z.object({
  address: z.string(),
  balance: z.string(),
  transactionCount: z.number().int().nonnegative(),
  lastTxHash: z.string().nullable(),
  lastTxBlock: z.number().int().nullable(),
  lastTxTimestamp: z.string().nullable(),
  auxiliaryState: z.record(z.unknown()),
  scanTime: z.string(),
});

const stateFileSchema = z.object({
  users: z.record(
    z.object({
      userId: z.number().int(),
      username: z.string().optional(),
      scanIntervalSeconds: z.number().positive(),
      createdAt: z.string(),
      active: z.boolean(),
    }),
  ),
  addresses: z.array(
    z.object({
      userId: z.number().int(),
      address: z.string(),
      label: z.string().optional(),
      createdAt: z.string(),
      active: z.boolean(),
    }),
  ),
  snapshots: z.record(snapshotSchema),
  transactions: z.array(
    z.object({
      address: z.string(),
      txHash: z.string(),
      type: transactionTypeSchema,
      amount: z.string(),
      from: z.string(),
      to: z.string().nullable(),
      blockNumber: z.number().int(),
      createdAt: z.string(),
    }),
  ),
  notifications: z.array(
    z.object({
      id: z.number().int(),
      userId: z.number().int(),
      address: z.string(),
      txHash: z.string(),
      kind: changeKindSchema,
      message: z.string(),
      sent: z.boolean(),
      sentAt: z.string().nullable(),
      createdAt: z.string(),
    }),
  ),
  nextNotificationId: z.number().int().positive(),
});

const emptyState = (): MonitorStateData => ({
  users: {},
  addresses: [],
  snapshots: {},
  transactions: [],
  notifications: [],
  nextNotificationId: 1,
});

export interface JsonStateStoreOptions {
  filePath: string;
  defaultScanIntervalSeconds: number;
  maxAddressesPerUser: number;
  now?: () => Date;
}

/**
 * JSON-file implementation of MonitorStore. The whole document is loaded once;
 * each mutation is written back through a serialised write.
 */
export class JsonStateStore implements MonitorStore {
  private data: MonitorStateData = emptyState();
  private loaded = false;
  private readonly writeLock = new Mutex();
  private readonly now: () => Date;

  constructor(private readonly options: JsonStateStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    if (this.loaded) {
      return;
    }
    let stored: unknown;
    try {
      stored = await readJsonFile(this.options.filePath);
    } catch (error: unknown) {
      throw new MonitorError(
        `State file ${this.options.filePath} is unreadable`,
        "Fatal",
        { cause: error },
      );
    }
    if (stored === undefined) {
      this.data = emptyState();
    } else {
      const parsed = stateFileSchema.safeParse(stored);
      if (!parsed.success) {
        throw new MonitorError(
          `State file ${this.options.filePath} does not match the expected shape`,
          "Fatal",
          { cause: parsed.error },
        );
      }
      this.data = parsed.data;
    }
    this.loaded = true;
  }

  async getSnapshot(address: string): Promise<AddressSnapshot | null> {
    this.assertLoaded();
    return this.data.snapshots[toLowerAddress(address)] ?? null;
  }

  async putSnapshot(address: string, snapshot: AddressSnapshot): Promise<void> {
    this.assertLoaded();
    this.data.snapshots[toLowerAddress(address)] = snapshot;
    await this.persist();
  }

  async listActiveAddresses(): Promise<string[]> {
    const monitored = await this.listMonitoredAddresses();
    return [...new Set(monitored.map((entry) => entry.address))];
  }

  async listMonitoredAddresses(): Promise<MonitoredAddress[]> {
    this.assertLoaded();
    return this.data.addresses
      .filter(
        (entry) =>
          entry.active && this.data.users[String(entry.userId)]?.active !== false,
      )
      .map((entry) => ({ ...entry }));
  }

  async getUserInterval(userId: number): Promise<number> {
    this.assertLoaded();
    return (
      this.data.users[String(userId)]?.scanIntervalSeconds ??
      this.options.defaultScanIntervalSeconds
    );
  }

  async setUserInterval(userId: number, seconds: number): Promise<boolean> {
    this.assertLoaded();
    const user = this.data.users[String(userId)];
    if (!user || !Number.isFinite(seconds) || seconds <= 0) {
      return false;
    }
    user.scanIntervalSeconds = seconds;
    await this.persist();
    return true;
  }

  async addUser(userId: number, username?: string): Promise<UserRecord> {
    this.assertLoaded();
    const key = String(userId);
    const existing = this.data.users[key];
    if (existing) {
      if (username && existing.username !== username) {
        existing.username = username;
        await this.persist();
      }
      return { ...existing };
    }
    const user: UserRecord = {
      userId,
      ...(username ? { username } : {}),
      scanIntervalSeconds: this.options.defaultScanIntervalSeconds,
      createdAt: this.timestamp(),
      active: true,
    };
    this.data.users[key] = user;
    await this.persist();
    return { ...user };
  }

  async addMonitoredAddress(
    userId: number,
    rawAddress: string,
    label?: string,
  ): Promise<boolean> {
    this.assertLoaded();
    const address = toLowerAddress(rawAddress);
    const owned = this.data.addresses.filter(
      (entry) => entry.userId === userId && entry.active,
    );
    const existing = this.data.addresses.find(
      (entry) => entry.userId === userId && entry.address === address,
    );
    if (existing?.active) {
      return false;
    }
    if (owned.length >= this.options.maxAddressesPerUser) {
      return false;
    }
    if (existing) {
      existing.active = true;
      if (label) {
        existing.label = label;
      }
    } else {
      this.data.addresses.push({
        userId,
        address,
        ...(label ? { label } : {}),
        createdAt: this.timestamp(),
        active: true,
      });
    }
    await this.persist();
    return true;
  }

  async removeMonitoredAddress(
    userId: number,
    rawAddress: string,
  ): Promise<boolean> {
    this.assertLoaded();
    const address = toLowerAddress(rawAddress);
    const existing = this.data.addresses.find(
      (entry) =>
        entry.userId === userId && entry.address === address && entry.active,
    );
    if (!existing) {
      return false;
    }
    existing.active = false;
    await this.persist();
    return true;
  }

  async enqueueNotification(
    notification: NewNotification,
  ): Promise<NotificationRecord> {
    this.assertLoaded();
    const address = toLowerAddress(notification.address);
    if (notification.txHash) {
      const duplicate = this.data.notifications.find(
        (record) =>
          record.userId === notification.userId &&
          record.txHash === notification.txHash &&
          record.kind === notification.kind,
      );
      if (duplicate) {
        return { ...duplicate };
      }
    }
    const record: NotificationRecord = {
      id: this.data.nextNotificationId,
      userId: notification.userId,
      address,
      txHash: notification.txHash,
      kind: notification.kind,
      message: notification.message,
      sent: false,
      sentAt: null,
      createdAt: this.timestamp(),
    };
    this.data.nextNotificationId += 1;
    this.data.notifications.push(record);
    await this.persist();
    return { ...record };
  }

  async listPendingNotifications(limit: number): Promise<NotificationRecord[]> {
    this.assertLoaded();
    return this.data.notifications
      .filter((record) => !record.sent)
      .sort((a, b) => a.id - b.id)
      .slice(0, Math.max(0, limit))
      .map((record) => ({ ...record }));
  }

  async markSent(id: number): Promise<boolean> {
    this.assertLoaded();
    const record = this.data.notifications.find((entry) => entry.id === id);
    if (!record) {
      return false;
    }
    if (!record.sent) {
      record.sent = true;
      record.sentAt = this.timestamp();
      await this.persist();
    }
    return true;
  }

  async recordTransaction(
    record: Omit<TransactionRecord, "createdAt">,
  ): Promise<boolean> {
    this.assertLoaded();
    if (this.data.transactions.some((entry) => entry.txHash === record.txHash)) {
      return false;
    }
    this.data.transactions.push({
      ...record,
      address: toLowerAddress(record.address),
      createdAt: this.timestamp(),
    });
    await this.persist();
    return true;
  }

  async listTransactions(address: string): Promise<TransactionRecord[]> {
    this.assertLoaded();
    const key = toLowerAddress(address);
    return this.data.transactions
      .filter((entry) => entry.address === key)
      .map((entry) => ({ ...entry }));
  }

  /**
   * Deletes notification and transaction rows created more than `days` days
   * ago. `days` must be an integer in [1, 365]; anything else deletes nothing.
   */
  async purgeOlderThan(days: unknown): Promise<PurgeResult> {
    this.assertLoaded();
    if (
      typeof days !== "number" ||
      !Number.isInteger(days) ||
      days < 1 ||
      days > 365
    ) {
      return { ok: false, reason: `Invalid retention days: ${String(days)}` };
    }
    const cutoff = this.now().getTime() - daysToMs(days);
    const isFresh = (createdAt: string): boolean =>
      new Date(createdAt).getTime() >= cutoff;

    const notifications = this.data.notifications.filter((record) =>
      isFresh(record.createdAt),
    );
    const transactions = this.data.transactions.filter((record) =>
      isFresh(record.createdAt),
    );
    const removedNotifications =
      this.data.notifications.length - notifications.length;
    const removedTransactions =
      this.data.transactions.length - transactions.length;

    this.data.notifications = notifications;
    this.data.transactions = transactions;
    if (removedNotifications > 0 || removedTransactions > 0) {
      await this.persist();
    }
    return { ok: true, removedNotifications, removedTransactions };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new MonitorError(
        "State store must be initialised before use",
        "Fatal",
      );
    }
  }

  private async persist(): Promise<void> {
    await this.writeLock.runExclusive(() =>
      writeJsonFile(this.options.filePath, this.data),
    );
  }
}
