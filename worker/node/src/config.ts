/**
 * Firewall worker configuration: transport settings, firewall options and
 * endpoint definitions.
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import {
  EndpointDefinitionSchema,
  FirewallError,
  errorMessage,
  type EndpointDefinition,
} from "@remote-firewall/core";
import type { Logger } from "@remote-firewall/common";

const LOG_PREFIX = "firewall-worker:config";

/**
 * Top-level worker process configuration.
 */
export interface WorkerProcessConfig {
  /** NATS server URL */
  natsUrl: string;
  /** Connection name (for debugging) */
  connectionName: string;
  /** Subject prefix: calls on `<prefix>.call.<endpoint>`, queries on `<prefix>.admin` */
  subjectPrefix: string;
  /** Queue group shared by every worker process serving the same endpoints */
  queueGroup: string;
  /** Path of the JSON file the firewall options and endpoints came from */
  configPath?: string;
  /** Firewall options (file values overridden by FIREWALL_* env vars), validated by ConfigStore */
  firewall: Record<string, unknown>;
  endpoints: EndpointDefinition[];
}

// Firewall options are left loose here; ConfigStore validates the merged result.
const ConfigFileSchema = z.object({
  firewall: z.record(z.unknown()).optional(),
  endpoints: z.array(EndpointDefinitionSchema).optional(),
});

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  return raw === "1" || raw === "true" || raw === "yes";
}

/** FIREWALL_* overrides; unset variables are omitted. */
function firewallFromEnv(env: Env): Record<string, unknown> {
  const entries: Array<[string, unknown]> = [
    ["maxLogCount", envNumber(env, "FIREWALL_MAX_LOG_COUNT")],
    ["cleanupInterval", envNumber(env, "FIREWALL_CLEANUP_INTERVAL")],
    ["rateLimitWindow", envNumber(env, "FIREWALL_RATE_LIMIT_WINDOW")],
    ["rateLimitMaxRequests", envNumber(env, "FIREWALL_RATE_LIMIT_MAX_REQUESTS")],
    ["debuggingMode", envBoolean(env, "FIREWALL_DEBUG")],
    ["logSampleRate", envNumber(env, "FIREWALL_LOG_SAMPLE_RATE")],
  ];
  return Object.fromEntries(entries.filter(([, value]) => value !== undefined));
}

function readConfigFile(configPath: string, log: Logger): z.infer<typeof ConfigFileSchema> | null {
  if (!existsSync(configPath)) {
    log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    log.error?.(
      { configPath, error: errorMessage(err) },
      `${LOG_PREFIX}:loadConfig - Failed to load config file`
    );
    return null;
  }
  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new FirewallError({
      code: "CONFIG_ERROR",
      message: `${LOG_PREFIX}:loadConfig - Invalid config file ${configPath}`,
      details: parsed.error.flatten(),
    });
  }
  return parsed.data;
}

/**
 * Load config from environment and optional config file.
 * Env: NATS_URL, SERVICE_NAME, SUBJECT_PREFIX, QUEUE_GROUP, CONFIG_PATH, FIREWALL_*.
 * CONFIG_PATH can point to a JSON file with `firewall` options and `endpoints`.
 * A missing or unparsable file is logged and skipped; a file with malformed
 * endpoint definitions throws CONFIG_ERROR.
 */
export function loadConfig(params: { log?: Logger; env?: Env } = {}): WorkerProcessConfig {
  const fallback: Logger = console;
  const log = params.log ?? fallback;
  const env = params.env ?? process.env;

  const natsUrl = env.NATS_URL ?? "nats://127.0.0.1:4222";
  const connectionName = env.SERVICE_NAME ?? "firewall-worker";
  const subjectPrefix = env.SUBJECT_PREFIX ?? "remote";
  const queueGroup = env.QUEUE_GROUP ?? `${subjectPrefix}-workers`;
  const configPath = env.CONFIG_PATH;

  let fileFirewall: Record<string, unknown> = {};
  let endpoints: EndpointDefinition[] = [];

  if (configPath) {
    const file = readConfigFile(configPath, log);
    if (file) {
      fileFirewall = file.firewall ?? {};
      endpoints = file.endpoints ?? [];
      log.info?.(
        { configPath, endpointCount: endpoints.length },
        `${LOG_PREFIX}:loadConfig - Loaded config from file`
      );
    }
  }

  return {
    natsUrl,
    connectionName,
    subjectPrefix,
    queueGroup,
    configPath,
    firewall: { ...fileFirewall, ...firewallFromEnv(env) },
    endpoints,
  };
}
