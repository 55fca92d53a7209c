/**
 * Firewall configuration schema and defaults.
 *
 * One flat set of options, validated as a whole on startup and on every
 * reconfiguration. Durations are in seconds.
 */

import { z } from "zod";

export const FirewallConfigSchema = z
  .object({
    /** Circular log buffer capacity */
    maxLogCount: z.number().int().positive(),
    /** Seconds between compaction passes; also the log retention horizon */
    cleanupInterval: z.number().positive(),
    /** Rate limit window length in seconds */
    rateLimitWindow: z.number().positive(),
    /** Accepted calls per (caller, endpoint) per window */
    rateLimitMaxRequests: z.number().int().positive(),
    /** Verbose eviction/rejection tracing */
    debuggingMode: z.boolean(),
    /** Fraction of calls that get a log entry up front (rejections are always logged) */
    logSampleRate: z.number().min(0).max(1),
  })
  .strict();

export type FirewallConfig = z.infer<typeof FirewallConfigSchema>;

export const FirewallConfigPatchSchema = FirewallConfigSchema.partial();

export type FirewallConfigPatch = z.infer<typeof FirewallConfigPatchSchema>;

export const defaultFirewallConfig: Readonly<FirewallConfig> = Object.freeze({
  maxLogCount: 1000,
  cleanupInterval: 300,
  rateLimitWindow: 60,
  rateLimitMaxRequests: 30,
  debuggingMode: false,
  logSampleRate: 1,
});
