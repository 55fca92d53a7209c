/**
 * Worker: handles one message (decode, dispatch through the firewall, build reply).
 */

import {
  AdminQuerySchema,
  RemoteCallSchema,
  errorMessage,
  type AdminReply,
  type RemoteCallReply,
} from "@remote-firewall/core";
import type { Logger, RemoteHandler } from "@remote-firewall/common";

const LOG_PREFIX = "firewall-worker:worker";

export interface HandleMessageParams {
  /** Raw request body (JSON string or buffer) */
  body: string | Uint8Array;
  /** Endpoint the subject maps to */
  endpoint: string;
  handler: RemoteHandler;
  log?: Logger;
}

function decodeJson(body: string | Uint8Array): { ok: true; value: unknown } | { ok: false; error: string } {
  const text = typeof body === "string" ? body : new TextDecoder().decode(body);
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

function invalidRequest(message: string, details?: unknown): RemoteCallReply {
  return {
    ok: false,
    error: details === undefined
      ? { code: "INVALID_REQUEST", message }
      : { code: "INVALID_REQUEST", message, details },
  };
}

/**
 * Decode and validate a remote call and run it through the firewall.
 * Resolves to the reply for function endpoints and to undefined for event
 * endpoints, which never answer.
 */
export async function handleMessage(params: HandleMessageParams): Promise<RemoteCallReply | undefined> {
  const { body, endpoint, handler } = params;
  const fallback: Logger = console;
  const log = params.log ?? fallback;

  const decoded = decodeJson(body);
  if (!decoded.ok) {
    log.warn?.({ endpoint, error: decoded.error }, `${LOG_PREFIX}:handleMessage - Invalid JSON`);
    return invalidRequest("Invalid JSON body");
  }

  const parsed = RemoteCallSchema.safeParse(decoded.value);
  if (!parsed.success) {
    log.warn?.(
      { endpoint, errors: parsed.error.flatten() },
      `${LOG_PREFIX}:handleMessage - Invalid remote call`
    );
    return invalidRequest("Invalid remote call", parsed.error.flatten());
  }

  const { callerId, args = [] } = parsed.data;
  if (handler.kindOf(endpoint) === "event") {
    await handler.fire(endpoint, callerId, args);
    return undefined;
  }
  return handler.call(endpoint, callerId, args);
}

/**
 * Answer a read-only log query.
 */
export function handleAdminQuery(params: { body: string | Uint8Array; handler: RemoteHandler; log?: Logger }): AdminReply {
  const { body, handler } = params;
  const fallback: Logger = console;
  const log = params.log ?? fallback;

  const decoded = decodeJson(body);
  if (!decoded.ok) {
    log.warn?.({ error: decoded.error }, `${LOG_PREFIX}:handleAdminQuery - Invalid JSON`);
    return { ok: false, error: { code: "INVALID_REQUEST", message: "Invalid JSON body" } };
  }
  const parsed = AdminQuerySchema.safeParse(decoded.value);
  if (!parsed.success) {
    return {
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid admin query", details: parsed.error.flatten() },
    };
  }

  const { eventLog } = handler;
  const query = parsed.data;
  switch (query.query) {
    case "all":
      return { ok: true, entries: eventLog.retrieveAll() };
    case "sender":
      return { ok: true, entries: eventLog.retrieveBySender(query.callerId) };
    case "timeRange":
      return { ok: true, entries: eventLog.retrieveByTimeRange(query.startMs, query.endMs) };
    case "minInfoCount":
      return { ok: true, entries: eventLog.retrieveWithMinInfoCount(query.count) };
    case "endpoint":
      return { ok: true, entries: eventLog.retrieveByEndpoint(query.endpoint) };
    case "stats":
      return { ok: true, stats: eventLog.statistics() };
  }
}
