/**
 * Process-wide firewall configuration.
 *
 * Explicitly initialized from defaults plus overrides, updated only through
 * configure(). Readers hold the store, never a copy of the values, so a
 * reconfiguration applies to the very next call.
 */

import {
  FirewallConfigPatchSchema,
  FirewallConfigSchema,
  FirewallError,
  defaultFirewallConfig,
  errorMessage,
  type FirewallConfig,
  type FirewallConfigPatch,
} from "@remote-firewall/core";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";

const SERVICE_NAME = "firewall-common:config-store";

export type ConfigListener = (next: Readonly<FirewallConfig>, previous: Readonly<FirewallConfig>) => void;

function definedEntries(patch: FirewallConfigPatch): FirewallConfigPatch {
  const out: FirewallConfigPatch = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

function parseConfig(raw: unknown): Readonly<FirewallConfig> {
  const parsed = FirewallConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FirewallError({
      code: "CONFIG_ERROR",
      message: `${SERVICE_NAME}: Invalid firewall configuration`,
      details: parsed.error.flatten(),
    });
  }
  return Object.freeze(parsed.data);
}

export class ConfigStore {
  private current: Readonly<FirewallConfig>;
  private listeners = new Set<ConfigListener>();
  private log: Logger;

  constructor(params?: { initial?: FirewallConfigPatch; loggerFactory?: LoggerFactory }) {
    this.log = resolveLogger(params?.loggerFactory, SERVICE_NAME);
    this.current = parseConfig({ ...defaultFirewallConfig, ...definedEntries(params?.initial ?? {}) });
  }

  get(): Readonly<FirewallConfig> {
    return this.current;
  }

  /** The configuration a patch would produce, without applying it. */
  preview(patch: unknown): Readonly<FirewallConfig> {
    const parsedPatch = FirewallConfigPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      throw new FirewallError({
        code: "CONFIG_ERROR",
        message: `${SERVICE_NAME}: Invalid firewall configuration`,
        details: parsedPatch.error.flatten(),
      });
    }
    return parseConfig({ ...this.current, ...definedEntries(parsedPatch.data) });
  }

  /**
   * Validate and apply a partial update. An invalid patch throws CONFIG_ERROR and
   * leaves the live configuration unchanged.
   */
  configure(patch: unknown): Readonly<FirewallConfig> {
    const previous = this.current;
    const next = this.preview(patch);
    this.current = next;

    const changed = FirewallConfigSchema.keyof().options.filter((key) => next[key] !== previous[key]);
    this.log.info?.({ changed }, `${SERVICE_NAME}:configure - Configuration applied`);

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.error?.(
          { error: errorMessage(err) },
          `${SERVICE_NAME}:configure - Listener failed`
        );
      }
    }
    return next;
  }

  /** Subscribe to applied updates; returns an unsubscribe function. */
  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
