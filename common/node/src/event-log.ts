/**
 * Bounded call log.
 *
 * A fixed-capacity circular buffer of LogEntry records. Indices increase
 * monotonically from 1 and map to slot `(index - 1) % capacity`; an index
 * resolves only while its slot still holds that entry, so a handle kept past
 * eviction quietly stops resolving.
 *
 * Entries leave the buffer three ways: overwritten on wraparound, dropped by
 * the periodic compaction once older than `cleanupInterval`, or cut off when
 * the capacity shrinks.
 */

import type {
  CallerId,
  FirewallErrorCode,
  LogEntry,
  LogEvent,
  LogIndex,
  LogLevel,
  LogStatistics,
  LogStatus,
} from "@remote-firewall/core";
import type { ConfigStore } from "./config-store.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { MAX_TIMER_DELAY_MS, secondsToMs, systemClock, type Clock } from "./utils.js";

const SERVICE_NAME = "firewall-common:event-log";

type EvictionReason = "wraparound" | "compaction" | "resize";

interface StoredEntry {
  index: LogIndex;
  callerId: CallerId;
  endpoint: string;
  timestamp: number;
  status: LogStatus;
  events: LogEvent[];
  infoCount: number;
  errorCount: number;
}

export interface EventLogParams {
  config: ConfigStore;
  clock?: Clock;
  loggerFactory?: LoggerFactory;
}

function emptySlots(capacity: number): Array<StoredEntry | undefined> {
  return Array.from({ length: capacity }, () => undefined);
}

function snapshot(entry: StoredEntry): LogEntry {
  return {
    index: entry.index,
    callerId: entry.callerId,
    endpoint: entry.endpoint,
    timestamp: entry.timestamp,
    status: entry.status,
    events: entry.events.map((event) => ({ ...event })),
    infoCount: entry.infoCount,
    errorCount: entry.errorCount,
  };
}

export class EventLog {
  private config: ConfigStore;
  private clock: Clock;
  private log: Logger;
  private slots: Array<StoredEntry | undefined>;
  private nextIndex = 1;
  private liveCount = 0;
  private timer?: ReturnType<typeof setInterval>;
  private unsubscribe: () => void;

  constructor(params: EventLogParams) {
    this.config = params.config;
    this.clock = params.clock ?? systemClock;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    this.slots = emptySlots(this.config.get().maxLogCount);

    this.unsubscribe = this.config.subscribe((next, previous) => {
      if (next.maxLogCount !== previous.maxLogCount) {
        this.resize(next.maxLogCount);
      }
      if (next.cleanupInterval !== previous.cleanupInterval && this.timer) {
        this.start();
      }
    });
  }

  get capacity(): number {
    return this.slots.length;
  }

  /** Live entries currently held. */
  get size(): number {
    return this.liveCount;
  }

  // ── Writes ────────────────────────────────────────────────────────

  /**
   * Allocate the next entry, overwriting the oldest slot once the buffer is full.
   */
  record(callerId: CallerId, endpoint: string): LogIndex {
    const index = this.nextIndex++;
    const slot = this.slotOf(index);
    const previous = this.slots[slot];
    if (previous) {
      this.traceEviction(previous, "wraparound");
    } else {
      this.liveCount++;
    }
    this.slots[slot] = {
      index,
      callerId,
      endpoint,
      timestamp: this.clock.now(),
      status: "pending",
      events: [],
      infoCount: 0,
      errorCount: 0,
    };
    return index;
  }

  /**
   * Add a sub-event. Returns false (and does nothing) when the handle is absent or
   * the entry has been evicted.
   */
  append(index: LogIndex | undefined, level: LogLevel, message: string, code?: FirewallErrorCode): boolean {
    const entry = this.resolve(index);
    if (!entry) return false;
    const event: LogEvent = { level, message, timestamp: this.clock.now() };
    if (code) event.code = code;
    entry.events.push(event);
    if (level === "error") {
      entry.errorCount++;
    } else {
      entry.infoCount++;
    }
    return true;
  }

  info(index: LogIndex | undefined, message: string): boolean {
    return this.append(index, "info", message);
  }

  error(index: LogIndex | undefined, message: string, code?: FirewallErrorCode): boolean {
    return this.append(index, "error", message, code);
  }

  setStatus(index: LogIndex | undefined, status: LogStatus): boolean {
    const entry = this.resolve(index);
    if (!entry) return false;
    entry.status = status;
    return true;
  }

  // ── Reads ─────────────────────────────────────────────────────────

  has(index: LogIndex | undefined): boolean {
    return this.resolve(index) !== undefined;
  }

  get(index: LogIndex | undefined): LogEntry | undefined {
    const entry = this.resolve(index);
    return entry ? snapshot(entry) : undefined;
  }

  retrieveAll(): LogEntry[] {
    return this.collect(() => true);
  }

  retrieveBySender(callerId: CallerId): LogEntry[] {
    return this.collect((entry) => entry.callerId === callerId);
  }

  retrieveByEndpoint(endpoint: string): LogEntry[] {
    return this.collect((entry) => entry.endpoint === endpoint);
  }

  /** Entries with `startMs <= timestamp <= endMs`. */
  retrieveByTimeRange(startMs: number, endMs: number): LogEntry[] {
    return this.collect((entry) => entry.timestamp >= startMs && entry.timestamp <= endMs);
  }

  retrieveWithMinInfoCount(count: number): LogEntry[] {
    return this.collect((entry) => entry.infoCount >= count);
  }

  statistics(): LogStatistics {
    const stats: LogStatistics = {
      totalEntries: 0,
      entriesWithErrors: 0,
      totalInfo: 0,
      totalErrors: 0,
      perEndpoint: {},
      perStatus: { pending: 0, completed: 0, rejected: 0, failed: 0 },
      oldestIndex: null,
      newestIndex: null,
      capacity: this.capacity,
    };
    for (const entry of this.liveEntries()) {
      stats.totalEntries++;
      if (entry.errorCount > 0) stats.entriesWithErrors++;
      stats.totalInfo += entry.infoCount;
      stats.totalErrors += entry.errorCount;
      stats.perEndpoint[entry.endpoint] = (stats.perEndpoint[entry.endpoint] ?? 0) + 1;
      stats.perStatus[entry.status]++;
      stats.oldestIndex ??= entry.index;
      stats.newestIndex = entry.index;
    }
    return stats;
  }

  // ── Maintenance ───────────────────────────────────────────────────

  /**
   * Evict entries older than the retention horizon (`cleanupInterval` seconds).
   * Returns the number of entries evicted.
   */
  compact(now: number = this.clock.now()): number {
    const cutoff = now - secondsToMs(this.config.get().cleanupInterval);
    let evicted = 0;
    for (const entry of this.liveEntries()) {
      if (entry.timestamp >= cutoff) continue;
      this.slots[this.slotOf(entry.index)] = undefined;
      this.liveCount--;
      evicted++;
      this.traceEviction(entry, "compaction");
    }
    if (evicted > 0) {
      this.log.info?.({ evicted, remaining: this.liveCount }, `${SERVICE_NAME}:compact - Compaction pass`);
    }
    return evicted;
  }

  /**
   * Change capacity, keeping only the entries whose indices still fall inside
   * the new window.
   */
  resize(capacity: number): void {
    if (capacity === this.capacity) return;
    const firstKept = this.nextIndex - capacity;
    const kept: StoredEntry[] = [];
    for (const entry of this.liveEntries()) {
      if (entry.index >= firstKept) {
        kept.push(entry);
      } else {
        this.traceEviction(entry, "resize");
      }
    }
    this.slots = emptySlots(capacity);
    for (const entry of kept) {
      this.slots[this.slotOf(entry.index)] = entry;
    }
    this.liveCount = kept.length;
    this.log.info?.({ capacity, kept: kept.length }, `${SERVICE_NAME}:resize - Buffer resized`);
  }

  /**
   * Start (or restart) the periodic compaction timer. The delay is capped at the
   * timer limit; the retention horizon in compact() keeps the full interval.
   */
  start(): void {
    this.stop();
    const intervalMs = Math.min(secondsToMs(this.config.get().cleanupInterval), MAX_TIMER_DELAY_MS);
    this.timer = setInterval(() => {
      this.compact();
    }, intervalMs);
    this.timer.unref?.();
    this.log.debug?.({ intervalMs }, `${SERVICE_NAME}:start - Compaction scheduled`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Stop the timer and detach from configuration updates. */
  dispose(): void {
    this.stop();
    this.unsubscribe();
  }

  // ── Internals ─────────────────────────────────────────────────────

  private slotOf(index: LogIndex): number {
    return (index - 1) % this.slots.length;
  }

  private resolve(index: LogIndex | undefined): StoredEntry | undefined {
    if (index === undefined || !Number.isInteger(index) || index < 1 || index >= this.nextIndex) {
      return undefined;
    }
    const entry = this.slots[this.slotOf(index)];
    return entry?.index === index ? entry : undefined;
  }

  /** Live entries in insertion order. */
  private *liveEntries(): Generator<StoredEntry> {
    const first = Math.max(1, this.nextIndex - this.slots.length);
    for (let index = first; index < this.nextIndex; index++) {
      const entry = this.slots[this.slotOf(index)];
      if (entry?.index === index) yield entry;
    }
  }

  private collect(predicate: (entry: StoredEntry) => boolean): LogEntry[] {
    const out: LogEntry[] = [];
    for (const entry of this.liveEntries()) {
      if (predicate(entry)) out.push(snapshot(entry));
    }
    return out;
  }

  private traceEviction(entry: StoredEntry, reason: EvictionReason): void {
    if (!this.config.get().debuggingMode) return;
    this.log.debug?.(
      { index: entry.index, callerId: entry.callerId, endpoint: entry.endpoint, reason },
      `${SERVICE_NAME}:evict - Entry evicted`
    );
  }
}
