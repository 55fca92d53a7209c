/**
 * Call log types: entries, sub-events and aggregate statistics.
 */

import type { FirewallErrorCode } from "./errors.js";
import type { CallerId } from "./values.js";

/** Handle to a log entry; valid until the entry is evicted. */
export type LogIndex = number;

export type LogLevel = "info" | "error";

/** `pending` until the call reaches a terminal stage. */
export type LogStatus = "pending" | "completed" | "rejected" | "failed";

export interface LogEvent {
  level: LogLevel;
  message: string;
  code?: FirewallErrorCode;
  timestamp: number;
}

/** Read-only snapshot of one call attempt. */
export interface LogEntry {
  index: LogIndex;
  callerId: CallerId;
  endpoint: string;
  /** Unix ms */
  timestamp: number;
  status: LogStatus;
  events: LogEvent[];
  infoCount: number;
  errorCount: number;
}

export interface LogStatistics {
  totalEntries: number;
  /** Entries with at least one error-level sub-event */
  entriesWithErrors: number;
  totalInfo: number;
  totalErrors: number;
  perEndpoint: Record<string, number>;
  perStatus: Record<LogStatus, number>;
  oldestIndex: LogIndex | null;
  newestIndex: LogIndex | null;
  capacity: number;
}
