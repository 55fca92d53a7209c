/**
 * Call outcomes.
 *
 * Every dispatched call ends in exactly one CallOutcome. Request/response
 * callers only ever see the RemoteResponse projection of it.
 */

import type { FirewallErrorCode } from "./errors.js";
import type { LogIndex } from "./log-entry.js";

/** Pipeline stage that produced a failure. */
export type CallStage = "lookup" | "middleware" | "rateLimit" | "validation" | "callback";

export interface CallError {
  code: FirewallErrorCode;
  message: string;
  details?: unknown;
}

export type CallCompleted<T> = {
  ok: true;
  /** Callback return value, verbatim; `undefined` means no data */
  value: T | undefined;
  logIndex?: LogIndex;
  durationMs: number;
};

export type CallRejected = {
  ok: false;
  stage: CallStage;
  error: CallError;
  logIndex?: LogIndex;
  durationMs: number;
};

export type CallOutcome<T = unknown> = CallCompleted<T> | CallRejected;

/** Failure sentinel / success value as seen by a request/response caller. */
export type RemoteResponse<T = unknown> =
  | { ok: true; value?: T }
  | { ok: false; error: { code: FirewallErrorCode; message: string; stage: CallStage } };

export function toRemoteResponse<T>(outcome: CallOutcome<T>): RemoteResponse<T> {
  if (outcome.ok) {
    return outcome.value === undefined ? { ok: true } : { ok: true, value: outcome.value };
  }
  return {
    ok: false,
    error: {
      code: outcome.error.code,
      message: outcome.error.message,
      stage: outcome.stage,
    },
  };
}
