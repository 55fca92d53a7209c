/**
 * Minimal logger for the firewall worker. Matches the Logger interface the
 * pipeline expects (component prefix, structured context + message) and
 * writes one JSON line per record.
 */

import type { Logger, NamedLoggerFactory } from "@remote-firewall/common";

type Level = "debug" | "info" | "warn" | "error";

function write(level: Level, ctx: object, msg: string): void {
  const line = JSON.stringify({ level, time: new Date().toISOString(), ...ctx, msg });
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. `get(prefix)` returns a logger whose records
 * carry the service name and the component prefix.
 */
export function createNodeJSLogger(serviceName: string): NamedLoggerFactory {
  return {
    get(prefix: string): Logger {
      const base = { service: serviceName, prefix };
      return {
        debug: (ctx, msg) => write("debug", { ...base, ...ctx }, msg),
        info: (ctx, msg) => write("info", { ...base, ...ctx }, msg),
        warn: (ctx, msg) => write("warn", { ...base, ...ctx }, msg),
        error: (ctx, msg) => write("error", { ...base, ...ctx }, msg),
      };
    },
  };
}
