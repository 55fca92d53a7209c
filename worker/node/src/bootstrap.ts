/**
 * Endpoint bootstrap: turns endpoint definitions into registrations by
 * attaching the callback and gates registered under their names.
 */

import { FirewallError, compileParamSpec, type EndpointDefinition } from "@remote-firewall/core";
import type { EndpointRegistration, Gate, Logger, RemoteHandler } from "@remote-firewall/common";
import { getCallback, getGate } from "./handler-registry.js";

const LOG_PREFIX = "firewall-worker:bootstrap";

function resolveGates(definition: EndpointDefinition): Gate[] {
  return definition.middleware.map((name) => {
    const gate = getGate(name);
    if (!gate) {
      throw new FirewallError({
        code: "NOT_FOUND",
        message: `${LOG_PREFIX}:prepareEndpoints - Unknown gate "${name}" on endpoint ${definition.name}`,
        details: { endpoint: definition.name, gate: name },
      });
    }
    return gate;
  });
}

/**
 * Build registrations for every definition that has a callback and is not
 * registered yet, without touching the handler. Definitions without a callback
 * are skipped with a warning; an unknown gate or a malformed parameter spec
 * throws, so one bad definition rejects the whole batch.
 */
export function prepareEndpoints(params: {
  handler: RemoteHandler;
  definitions: EndpointDefinition[];
  log?: Logger;
}): EndpointRegistration[] {
  const { handler, definitions } = params;
  const fallback: Logger = console;
  const log = params.log ?? fallback;
  const prepared = new Map<string, EndpointRegistration>();

  for (const definition of definitions) {
    if (handler.has(definition.name) || prepared.has(definition.name)) continue;
    const callback = getCallback(definition.name);
    if (!callback) {
      log.warn?.(
        { endpoint: definition.name },
        `${LOG_PREFIX}:prepareEndpoints - No callback registered, skipping`
      );
      continue;
    }
    compileParamSpec(definition.params);
    prepared.set(definition.name, {
      name: definition.name,
      kind: definition.kind,
      params: definition.params,
      middleware: resolveGates(definition),
      forceLogging: definition.forceLogging,
      rateLimit: definition.rateLimit,
      callback,
    });
  }
  return [...prepared.values()];
}

/**
 * Register prepared endpoints. Returns the names registered by this call.
 */
export function registerPrepared(params: {
  handler: RemoteHandler;
  registrations: EndpointRegistration[];
  log?: Logger;
}): string[] {
  const { handler, registrations } = params;
  const fallback: Logger = console;
  const log = params.log ?? fallback;
  for (const registration of registrations) {
    handler.register(registration);
  }
  log.info?.(
    { registered: registrations.length, total: handler.endpointNames().length },
    `${LOG_PREFIX}:registerEndpoints - Endpoints registered`
  );
  return registrations.map((registration) => registration.name);
}

/** Prepare and register definitions in one step; nothing is registered on failure. */
export function registerEndpoints(params: {
  handler: RemoteHandler;
  definitions: EndpointDefinition[];
  log?: Logger;
}): string[] {
  return registerPrepared({ ...params, registrations: prepareEndpoints(params) });
}
