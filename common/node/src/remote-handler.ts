/**
 * Remote call dispatcher.
 *
 * Owns the endpoint registry and runs every inbound call through
 *
 *   Received → MiddlewareCheck → RateLimitCheck → ParamValidation → CallbackInvocation → Completed
 *
 * stopping at the first stage that fails. Per-call failures are returned as
 * CallOutcome values and recorded on the call's log entry; nothing a caller
 * sends and nothing a callback throws escapes invoke().
 */

import {
  FirewallError,
  compileParamSpec,
  errorMessage,
  formatDescriptor,
  toRemoteResponse,
  type CallOutcome,
  type CallStage,
  type CallValue,
  type CallerId,
  type CompiledSpec,
  type EndpointKind,
  type FirewallConfig,
  type FirewallConfigPatch,
  type FirewallErrorCode,
  type LogIndex,
  type RateLimitOverride,
  type RemoteResponse,
} from "@remote-firewall/core";
import { Assertions } from "./assertions.js";
import { ConfigStore } from "./config-store.js";
import { EventLog } from "./event-log.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { MiddlewareChain, type EndpointRef, type Gate } from "./middleware-chain.js";
import { RateLimiter } from "./rate-limiter.js";
import { systemClock, type Clock, type RandomSource } from "./utils.js";
import { validateArgs } from "./validator.js";

const SERVICE_NAME = "firewall-common:remote-handler";

// ── Types ───────────────────────────────────────────────────────────

/**
 * Application callback. Receives only arguments that passed validation, one per
 * declared parameter.
 */
export type RemoteCallback = (
  callerId: CallerId,
  logIndex: LogIndex | undefined,
  ...args: CallValue[]
) => unknown;

export interface EndpointOptions {
  middleware?: Gate[];
  /** Record a log entry for every call regardless of sampling */
  forceLogging?: boolean;
  rateLimit?: RateLimitOverride;
}

export interface EndpointRegistration extends EndpointOptions {
  name: string;
  kind: EndpointKind;
  /** Ordered `[name, type]` pairs */
  params?: unknown;
  callback: RemoteCallback;
}

export interface EndpointDescription {
  name: string;
  kind: EndpointKind;
  params: Array<{ name: string; type: string }>;
  middleware: number;
  forceLogging: boolean;
  rateLimit?: RateLimitOverride;
}

interface RegisteredEndpoint {
  ref: EndpointRef;
  spec: CompiledSpec;
  forceLogging: boolean;
  rateLimit?: RateLimitOverride;
  callback: RemoteCallback;
}

export interface RemoteHandlerParams {
  /** A shared store, or overrides applied on top of the defaults */
  config?: ConfigStore | FirewallConfigPatch;
  clock?: Clock;
  /** Sampling source; defaults to Math.random */
  random?: RandomSource;
  loggerFactory?: LoggerFactory;
}

interface Rejection {
  endpoint: RegisteredEndpoint;
  callerId: CallerId;
  logIndex: LogIndex | undefined;
  stage: Exclude<CallStage, "lookup">;
  code: FirewallErrorCode;
  message: string;
  details?: unknown;
  startedAt: number;
  /** The failing stage already wrote its own sub-event */
  alreadyLogged?: boolean;
}

// ── Handler ─────────────────────────────────────────────────────────

export class RemoteHandler {
  readonly config: ConfigStore;
  readonly eventLog: EventLog;
  readonly rateLimiter: RateLimiter;
  private readonly middleware: MiddlewareChain;
  readonly assertions: Assertions;

  private endpoints = new Map<string, RegisteredEndpoint>();
  private clock: Clock;
  private random: RandomSource;
  private log: Logger;

  constructor(params: RemoteHandlerParams = {}) {
    const { loggerFactory } = params;
    this.clock = params.clock ?? systemClock;
    this.random = params.random ?? Math.random;
    this.log = resolveLogger(loggerFactory, SERVICE_NAME);
    this.config =
      params.config instanceof ConfigStore
        ? params.config
        : new ConfigStore({ initial: params.config, loggerFactory });
    this.eventLog = new EventLog({ config: this.config, clock: this.clock, loggerFactory });
    this.rateLimiter = new RateLimiter({ config: this.config, clock: this.clock, loggerFactory });
    this.middleware = new MiddlewareChain({ eventLog: this.eventLog, loggerFactory });
    this.assertions = new Assertions(this.eventLog);
  }

  // ── Registration ──────────────────────────────────────────────────

  /**
   * Register an endpoint. Throws SPEC_ERROR for a malformed parameter spec and
   * CONFLICT for a duplicate name; in both cases nothing is registered.
   */
  register(def: EndpointRegistration): EndpointRef {
    if (!def.name) {
      throw new FirewallError({ code: "SPEC_ERROR", message: "Endpoint name must be a non-empty string" });
    }
    if (this.endpoints.has(def.name)) {
      throw new FirewallError({
        code: "CONFLICT",
        message: `${SERVICE_NAME}:register - Endpoint already registered: ${def.name}`,
        details: { name: def.name },
      });
    }

    let spec: CompiledSpec;
    try {
      spec = compileParamSpec(def.params ?? []);
    } catch (err) {
      this.log.error?.(
        { endpoint: def.name, error: errorMessage(err) },
        `${SERVICE_NAME}:register - Invalid parameter spec`
      );
      throw err;
    }

    const ref: EndpointRef = Object.freeze({ name: def.name, kind: def.kind });
    this.endpoints.set(def.name, {
      ref,
      spec,
      forceLogging: def.forceLogging ?? false,
      rateLimit: def.rateLimit,
      callback: def.callback,
    });
    for (const gate of def.middleware ?? []) {
      this.middleware.add(def.name, gate);
    }

    this.log.info?.(
      { endpoint: def.name, kind: def.kind, params: spec.params.length, middleware: this.middleware.size(def.name) },
      `${SERVICE_NAME}:register - Endpoint registered`
    );
    return ref;
  }

  /** Register a fire-and-forget endpoint. */
  onEvent(name: string, params: unknown, callback: RemoteCallback, options: EndpointOptions = {}): EndpointRef {
    return this.register({ ...options, name, kind: "event", params, callback });
  }

  /** Register a request/response endpoint. */
  onFunction(name: string, params: unknown, callback: RemoteCallback, options: EndpointOptions = {}): EndpointRef {
    return this.register({ ...options, name, kind: "function", params, callback });
  }

  /** Append a gate to an endpoint's chain. */
  use(name: string, gate: Gate): void {
    if (!this.endpoints.has(name)) {
      throw new FirewallError({
        code: "NOT_FOUND",
        message: `${SERVICE_NAME}:use - Unknown endpoint: ${name}`,
        details: { name },
      });
    }
    this.middleware.add(name, gate);
  }

  has(name: string): boolean {
    return this.endpoints.has(name);
  }

  kindOf(name: string): EndpointKind | undefined {
    return this.endpoints.get(name)?.ref.kind;
  }

  endpointNames(): string[] {
    return [...this.endpoints.keys()];
  }

  describe(name: string): EndpointDescription | undefined {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) return undefined;
    return {
      name: endpoint.ref.name,
      kind: endpoint.ref.kind,
      params: endpoint.spec.params.map((param) => ({
        name: param.name,
        type: formatDescriptor(param.descriptor),
      })),
      middleware: this.middleware.size(name),
      forceLogging: endpoint.forceLogging,
      rateLimit: endpoint.rateLimit,
    };
  }

  // ── Lifecycle ─────────────────────────────────────────────────────

  configure(patch: unknown): Readonly<FirewallConfig> {
    return this.config.configure(patch);
  }

  /** Start periodic log compaction. */
  start(): void {
    this.eventLog.start();
  }

  stop(): void {
    this.eventLog.stop();
  }

  // ── Dispatch ──────────────────────────────────────────────────────

  /**
   * Run one call through the pipeline. Always resolves.
   */
  async invoke(name: string, callerId: CallerId, args: readonly unknown[] = []): Promise<CallOutcome> {
    const startedAt = this.clock.now();
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      this.log.warn?.({ endpoint: name, callerId }, `${SERVICE_NAME}:invoke - Unknown endpoint`);
      return {
        ok: false,
        stage: "lookup",
        error: { code: "NOT_FOUND", message: `Unknown endpoint: ${name}` },
        durationMs: 0,
      };
    }

    // Received
    const logIndex = this.shouldRecord(endpoint) ? this.eventLog.record(callerId, name) : undefined;

    // MiddlewareCheck
    const gate = this.middleware.run({ callerId, logIndex, endpoint: endpoint.ref, args });
    if (!gate.accepted) {
      return this.reject({
        endpoint,
        callerId,
        logIndex,
        stage: "middleware",
        code: "MIDDLEWARE_REJECTED",
        message: gate.message,
        details: { gateIndex: gate.gateIndex, threw: gate.threw },
        startedAt,
        alreadyLogged: gate.threw && logIndex !== undefined,
      });
    }

    // RateLimitCheck
    if (!this.rateLimiter.allow(callerId, name, endpoint.rateLimit)) {
      return this.reject({
        endpoint,
        callerId,
        logIndex,
        stage: "rateLimit",
        code: "RATE_LIMITED",
        message: "rate limit exceeded",
        startedAt,
      });
    }

    // ParamValidation
    const validation = validateArgs(endpoint.spec, args);
    if (!validation.ok) {
      // Malformed calls do not eat into the caller's quota.
      this.rateLimiter.refund(callerId, name);
      const { argIndex, argName, reason } = validation.error;
      return this.reject({
        endpoint,
        callerId,
        logIndex,
        stage: "validation",
        code: "VALIDATION_ERROR",
        message: `argument #${argIndex + 1} "${argName}": ${reason}`,
        details: validation.error,
        startedAt,
      });
    }

    // CallbackInvocation
    try {
      const value = await endpoint.callback(callerId, logIndex, ...validation.args);
      this.eventLog.setStatus(logIndex, "completed");
      return { ok: true, value, logIndex, durationMs: this.clock.now() - startedAt };
    } catch (err) {
      const message = errorMessage(err);
      const index = logIndex ?? this.eventLog.record(callerId, name);
      this.eventLog.error(index, `callback: ${message}`, "CALLBACK_ERROR");
      this.eventLog.setStatus(index, "failed");
      this.log.error?.(
        { endpoint: name, callerId, logIndex: index, error: message },
        `${SERVICE_NAME}:invoke - Callback threw`
      );
      return {
        ok: false,
        stage: "callback",
        error: { code: "CALLBACK_ERROR", message },
        logIndex: index,
        durationMs: this.clock.now() - startedAt,
      };
    }
  }

  /** Fire-and-forget delivery: the outcome is only visible in the log. */
  async fire(name: string, callerId: CallerId, args: readonly unknown[] = []): Promise<void> {
    await this.invoke(name, callerId, args);
  }

  /** Request/response delivery: failures come back as a sentinel, never a throw. */
  async call(name: string, callerId: CallerId, args: readonly unknown[] = []): Promise<RemoteResponse> {
    return toRemoteResponse(await this.invoke(name, callerId, args));
  }

  // ── Internals ─────────────────────────────────────────────────────

  private shouldRecord(endpoint: RegisteredEndpoint): boolean {
    if (endpoint.forceLogging) return true;
    const rate = this.config.get().logSampleRate;
    if (rate >= 1) return true;
    if (rate <= 0) return false;
    return this.random() < rate;
  }

  /** Rejections are always logged, recording an entry if the call was not sampled. */
  private reject(rejection: Rejection): CallOutcome {
    const { endpoint, callerId, stage, code, message, details } = rejection;
    const logIndex = rejection.logIndex ?? this.eventLog.record(callerId, endpoint.ref.name);
    if (!rejection.alreadyLogged) {
      this.eventLog.error(logIndex, `${stage}: ${message}`, code);
    }
    this.eventLog.setStatus(logIndex, "rejected");

    if (this.config.get().debuggingMode) {
      this.log.debug?.(
        { endpoint: endpoint.ref.name, callerId, stage, code, logIndex, message },
        `${SERVICE_NAME}:invoke - Call rejected`
      );
    }
    return {
      ok: false,
      stage,
      error: details === undefined ? { code, message } : { code, message, details },
      logIndex,
      durationMs: this.clock.now() - rejection.startedAt,
    };
  }
}
