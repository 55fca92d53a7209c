/**
 * Structured logging seam for the firewall components. Every method is
 * optional so a host can pass any subset (or plain `console`).
 */

export interface Logger {
  debug?: (ctx: object, msg: string) => void;
  info?: (ctx: object, msg: string) => void;
  warn?: (ctx: object, msg: string) => void;
  error?: (ctx: object, msg: string) => void;
}

export interface NamedLoggerFactory {
  get(name: string): Logger;
}

/** A logger, or a factory handing out one logger per component name. */
export type LoggerFactory = Logger | NamedLoggerFactory;

function isNamedFactory(factory: LoggerFactory): factory is NamedLoggerFactory {
  return "get" in factory && typeof factory.get === "function";
}

/** Logger for one component; falls back to the console. */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  const fallback: Logger = console;
  if (!factory) return fallback;
  return isNamedFactory(factory) ? factory.get(serviceName) : factory;
}
