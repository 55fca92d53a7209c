/**
 * Remote call wire format (NATS).
 *
 * Requests arrive on `<prefix>.call.<endpoint>`; query requests on
 * `<prefix>.admin`. Both are JSON.
 */

import type { CallerId } from "./values.js";
import type { LogEntry, LogStatistics } from "./log-entry.js";
import type { RemoteResponse } from "./outcome.js";

export type RemoteCallWire = {
  callerId: CallerId;
  args?: unknown[];
};

/** Reply on a function subject: the call's response, or a decode failure. */
export type RemoteCallReply =
  | RemoteResponse
  | { ok: false; error: { code: "INVALID_REQUEST"; message: string; details?: unknown } };

export type AdminQueryWire =
  | { query: "all" }
  | { query: "sender"; callerId: CallerId }
  | { query: "timeRange"; startMs: number; endMs: number }
  | { query: "minInfoCount"; count: number }
  | { query: "endpoint"; endpoint: string }
  | { query: "stats" };

export type AdminReply =
  | { ok: true; entries: LogEntry[] }
  | { ok: true; stats: LogStatistics }
  | { ok: false; error: { code: string; message: string; details?: unknown } };

/** Subject for one endpoint under a prefix. */
export function callSubject(prefix: string, endpoint: string): string {
  return `${prefix}.call.${endpoint}`;
}

export function adminSubject(prefix: string): string {
  return `${prefix}.admin`;
}
