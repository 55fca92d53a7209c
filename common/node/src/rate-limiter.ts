/**
 * Per (caller, endpoint) request windows.
 *
 * Records are bucketed by endpoint and then by caller. A record whose window
 * has elapsed is reset lazily on the next call from that pair; records are
 * never deleted on a timer.
 */

import type { CallerId, RateLimitOverride } from "@remote-firewall/core";
import type { ConfigStore } from "./config-store.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { secondsToMs, systemClock, type Clock } from "./utils.js";

const SERVICE_NAME = "firewall-common:rate-limiter";

export interface RateWindowRecord {
  /** Unix ms */
  windowStart: number;
  count: number;
}

export interface RateLimiterParams {
  config: ConfigStore;
  clock?: Clock;
  loggerFactory?: LoggerFactory;
}

export class RateLimiter {
  private buckets = new Map<string, Map<CallerId, RateWindowRecord>>();
  private config: ConfigStore;
  private clock: Clock;
  private log: Logger;

  constructor(params: RateLimiterParams) {
    this.config = params.config;
    this.clock = params.clock ?? systemClock;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Count one call and decide whether it is within the ceiling.
   *
   * A denied call still counts (the stored count is capped one past the
   * ceiling), so spamming never restarts the window early.
   */
  allow(callerId: CallerId, endpoint: string, limit?: RateLimitOverride): boolean {
    const config = this.config.get();
    const maxRequests = limit?.maxRequests ?? config.rateLimitMaxRequests;
    const windowMs = secondsToMs(limit?.window ?? config.rateLimitWindow);
    const now = this.clock.now();

    let bucket = this.buckets.get(endpoint);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(endpoint, bucket);
    }

    const record = bucket.get(callerId);
    if (!record || now > record.windowStart + windowMs) {
      bucket.set(callerId, { windowStart: now, count: 1 });
      return true;
    }

    record.count = Math.min(record.count + 1, maxRequests + 1);
    const allowed = record.count <= maxRequests;
    if (!allowed && config.debuggingMode) {
      this.log.debug?.(
        { callerId, endpoint, count: record.count, maxRequests, windowStart: record.windowStart },
        `${SERVICE_NAME}:allow - Ceiling reached`
      );
    }
    return allowed;
  }

  /**
   * Give back the slot an allowed call took when a later stage rejects it.
   * The window start is left untouched.
   */
  refund(callerId: CallerId, endpoint: string): boolean {
    const record = this.buckets.get(endpoint)?.get(callerId);
    if (!record || record.count === 0) return false;
    record.count--;
    return true;
  }

  /** Copy of the current record for a pair, if any. */
  peek(callerId: CallerId, endpoint: string): RateWindowRecord | undefined {
    const record = this.buckets.get(endpoint)?.get(callerId);
    return record ? { ...record } : undefined;
  }

  /** Number of (caller, endpoint) records held. */
  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.size;
    return total;
  }
}
