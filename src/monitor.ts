import {
  type DetectOptions,
  type RecentTransactionSource,
  detectChanges,
} from "./changeDetector";
import { toMonitorError } from "./errors";
import { createLogger, type LoggerLike } from "./logger";
import { formatChangeNotification } from "./notificationFormatter";
import type { MonitorStore } from "./stateStore";
import type { AddressSnapshot, ChangeEvent } from "./types";
import { toLowerAddress } from "./utils";

export type ScanPhase = "idle" | "fetching" | "diffing" | "persisting";

export interface SnapshotSource extends RecentTransactionSource {
  fetchSnapshot(address: string): Promise<AddressSnapshot>;
}

export interface AddressScanResult {
  address: string;
  status: "scanned" | "skipped" | "failed";
  events: ChangeEvent[];
  error?: string;
}

export interface ScanCycleSummary {
  addresses: number;
  scanned: number;
  skipped: number;
  failed: number;
  events: number;
  durationMs: number;
}

export interface MonitorStats {
  totalScans: number;
  addressesWithChanges: number;
  notificationsQueued: number;
  errors: number;
  lastScanTime: string | null;
  startedAt: string;
  uptimeSeconds: number;
}

type ScanCounters = Omit<MonitorStats, "startedAt" | "uptimeSeconds">;

export interface AddressMonitorDeps {
  store: MonitorStore;
  fetcher: SnapshotSource;
  detectOptions?: DetectOptions;
  now?: () => Date;
  logger?: LoggerLike;
}

/**
 * One scan cycle: every due address is fetched, diffed against its stored
 * snapshot, persisted and turned into queued notifications. Addresses run
 * concurrently and fail independently.
 */
export class AddressMonitor {
  private readonly logger: LoggerLike;
  private readonly now: () => Date;
  private readonly phases = new Map<string, ScanPhase>();
  private readonly startedAt: Date;
  private stats: ScanCounters = {
    totalScans: 0,
    addressesWithChanges: 0,
    notificationsQueued: 0,
    errors: 0,
    lastScanTime: null,
  };

  constructor(private readonly deps: AddressMonitorDeps) {
    this.logger = deps.logger ?? createLogger("monitor");
    this.now = deps.now ?? (() => new Date());
    this.startedAt = this.now();
  }

  async scanCycle(): Promise<ScanCycleSummary> {
    const started = this.now().getTime();
    const owners = await this.groupOwners();
    const summary: ScanCycleSummary = {
      addresses: owners.size,
      scanned: 0,
      skipped: 0,
      failed: 0,
      events: 0,
      durationMs: 0,
    };
    if (!owners.size) {
      this.logger.debug("No active addresses to scan");
      return summary;
    }

    const outcomes = await Promise.allSettled(
      [...owners].map(([address, userIds]) =>
        this.scanIfDue(address, userIds),
      ),
    );

    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        summary.failed += 1;
        continue;
      }
      summary[outcome.value.status] += 1;
      summary.events += outcome.value.events.length;
    }

    this.stats.totalScans += 1;
    this.stats.lastScanTime = this.now().toISOString();
    summary.durationMs = this.now().getTime() - started;
    if (summary.scanned || summary.failed) {
      this.logger.info("Scan cycle complete", { ...summary });
    }
    return summary;
  }

  /**
   * Scans one address now, ignoring its interval. Skipped when a scan of the
   * same address is already under way.
   */
  async forceScan(rawAddress: string): Promise<AddressScanResult> {
    const address = toLowerAddress(rawAddress);
    const owners = await this.groupOwners();
    if (!this.claim(address)) {
      return { address, status: "skipped", events: [] };
    }
    return this.scanAddress(address, owners.get(address) ?? []);
  }

  getPhase(address: string): ScanPhase {
    return this.phases.get(toLowerAddress(address)) ?? "idle";
  }

  getStats(): MonitorStats {
    return {
      ...this.stats,
      startedAt: this.startedAt.toISOString(),
      uptimeSeconds: Math.floor(
        (this.now().getTime() - this.startedAt.getTime()) / 1000,
      ),
    };
  }

  private async groupOwners(): Promise<Map<string, number[]>> {
    const entries = await this.deps.store.listMonitoredAddresses();
    const owners = new Map<string, number[]>();
    for (const entry of entries) {
      const users = owners.get(entry.address) ?? [];
      if (!users.includes(entry.userId)) {
        users.push(entry.userId);
      }
      owners.set(entry.address, users);
    }
    return owners;
  }

  private async scanIfDue(
    address: string,
    userIds: number[],
  ): Promise<AddressScanResult> {
    if (!this.claim(address)) {
      return { address, status: "skipped", events: [] };
    }
    try {
      if (!(await this.isDue(address, userIds))) {
        this.phases.set(address, "idle");
        return { address, status: "skipped", events: [] };
      }
    } catch (error: unknown) {
      this.phases.set(address, "idle");
      return this.fail(address, error);
    }
    return this.scanAddress(address, userIds);
  }

  /** Marks the address as fetching unless a scan of it is already in flight. */
  private claim(address: string): boolean {
    if (this.getPhase(address) !== "idle") {
      return false;
    }
    this.phases.set(address, "fetching");
    return true;
  }

  /** Due when never scanned, or when the shortest owner interval has elapsed. */
  private async isDue(address: string, userIds: number[]): Promise<boolean> {
    const previous = await this.deps.store.getSnapshot(address);
    if (!previous) {
      return true;
    }
    const lastScan = Date.parse(previous.scanTime);
    if (Number.isNaN(lastScan)) {
      return true;
    }
    const intervals = await Promise.all(
      userIds.map((userId) => this.deps.store.getUserInterval(userId)),
    );
    const intervalSeconds = intervals.length ? Math.min(...intervals) : 0;
    return this.now().getTime() >= lastScan + intervalSeconds * 1000;
  }

  private async scanAddress(
    address: string,
    userIds: number[],
  ): Promise<AddressScanResult> {
    const { store, fetcher } = this.deps;
    try {
      const previous = await store.getSnapshot(address);
      const current = await fetcher.fetchSnapshot(address);

      this.phases.set(address, "diffing");
      const events = await detectChanges(address, previous, current, fetcher, {
        ...this.deps.detectOptions,
        logger: this.logger,
      });

      this.phases.set(address, "persisting");
      await store.putSnapshot(address, current);
      if (events.length) {
        this.stats.addressesWithChanges += 1;
        this.logger.info(`Detected ${events.length} changes`, { address });
      }
      for (const event of events) {
        await this.recordEvent(address, userIds, event, current.scanTime);
      }
      return { address, status: "scanned", events };
    } catch (error: unknown) {
      return this.fail(address, error);
    } finally {
      this.phases.set(address, "idle");
    }
  }

  private async recordEvent(
    address: string,
    userIds: number[],
    event: ChangeEvent,
    observedAt: string,
  ): Promise<void> {
    const { store } = this.deps;
    const txHash = event.kind === "new_transaction" ? event.hash : "";
    if (event.kind === "new_transaction") {
      await store.recordTransaction({
        address,
        txHash: event.hash,
        type: event.classifiedType,
        amount: event.amount,
        from: event.from,
        to: event.to,
        blockNumber: event.block,
      });
    }
    const message = formatChangeNotification(address, event, observedAt);
    for (const userId of userIds) {
      await store.enqueueNotification({
        userId,
        address,
        txHash,
        kind: event.kind,
        message,
      });
      this.stats.notificationsQueued += 1;
    }
  }

  private fail(address: string, error: unknown): AddressScanResult {
    const failure = toMonitorError(error);
    this.stats.errors += 1;
    this.logger.error(`Scan of ${address} abandoned for this tick`, {
      kind: failure.kind,
      error: failure.message,
    });
    return { address, status: "failed", events: [], error: failure.message };
  }
}
