/**
 * Unit tests for message decoding, dispatch and admin queries.
 */

import { describe, it, expect, vi } from "vitest";
import type { AdminReply, CallValue, LogIndex } from "@remote-firewall/core";
import { RemoteHandler, type Logger } from "@remote-firewall/common";
import { handleAdminQuery, handleMessage } from "./worker.js";

const silentLogger = {
  get: (): Logger => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function setup() {
  const handler = new RemoteHandler({ loggerFactory: silentLogger, clock: { now: () => 1_000 } });
  const ping = vi.fn((_callerId: string, logIndex: LogIndex | undefined) => {
    handler.eventLog.info(logIndex, "pong");
  });
  handler.onFunction("shop.price", [["qty", "integer"]], (_callerId, _logIndex, qty: CallValue) =>
    typeof qty === "number" ? qty * 10 : 0
  );
  handler.onEvent("chat.ping", [], ping);
  return { handler, ping };
}

function entryIndices(reply: AdminReply): number[] {
  if (!reply.ok || !("entries" in reply)) throw new Error("expected entries");
  return reply.entries.map((entry) => entry.index);
}

describe("handleMessage", () => {
  it("should answer a function call", async () => {
    const { handler } = setup();
    const reply = await handleMessage({
      body: JSON.stringify({ callerId: "p1", args: [3] }),
      endpoint: "shop.price",
      handler,
      log: silentLogger,
    });
    expect(reply).toEqual({ ok: true, value: 30 });
  });

  it("should return the failure sentinel for a rejected call", async () => {
    const { handler } = setup();
    const reply = await handleMessage({
      body: JSON.stringify({ callerId: "p1" }),
      endpoint: "shop.price",
      handler,
      log: silentLogger,
    });
    expect(reply).toEqual({
      ok: false,
      error: { code: "VALIDATION_ERROR", message: 'argument #1 "qty": missing required value', stage: "validation" },
    });
  });

  it("should deliver an event without a reply", async () => {
    const { handler, ping } = setup();
    const reply = await handleMessage({
      body: new TextEncoder().encode(JSON.stringify({ callerId: "p1", args: [] })),
      endpoint: "chat.ping",
      handler,
      log: silentLogger,
    });
    expect(reply).toBeUndefined();
    expect(ping).toHaveBeenCalledTimes(1);
  });

  it("should reject a body that is not JSON", async () => {
    const { handler } = setup();
    const reply = await handleMessage({ body: "{", endpoint: "shop.price", handler, log: silentLogger });
    expect(reply).toEqual({ ok: false, error: { code: "INVALID_REQUEST", message: "Invalid JSON body" } });
    expect(handler.eventLog.size).toBe(0);
  });

  it("should reject a call without a caller", async () => {
    const { handler } = setup();
    const reply = await handleMessage({
      body: JSON.stringify({ args: [1] }),
      endpoint: "shop.price",
      handler,
      log: silentLogger,
    });
    expect(reply).toMatchObject({ ok: false, error: { code: "INVALID_REQUEST", message: "Invalid remote call" } });
  });

  it("should report an unknown endpoint", async () => {
    const { handler } = setup();
    const reply = await handleMessage({
      body: JSON.stringify({ callerId: "p1" }),
      endpoint: "nope",
      handler,
      log: silentLogger,
    });
    expect(reply).toEqual({
      ok: false,
      error: { code: "NOT_FOUND", message: "Unknown endpoint: nope", stage: "lookup" },
    });
  });
});

describe("handleAdminQuery", () => {
  async function seeded() {
    const ctx = setup();
    const { handler } = ctx;
    await handler.invoke("shop.price", "p1", [3]);
    await handler.invoke("shop.price", "p2", [1.5]);
    await handler.invoke("chat.ping", "p1");
    return ctx;
  }

  function query(handler: RemoteHandler, body: unknown): AdminReply {
    return handleAdminQuery({ body: JSON.stringify(body), handler, log: silentLogger });
  }

  it("should list entries by the requested filter", async () => {
    const { handler } = await seeded();
    expect(entryIndices(query(handler, { query: "all" }))).toEqual([1, 2, 3]);
    expect(entryIndices(query(handler, { query: "sender", callerId: "p1" }))).toEqual([1, 3]);
    expect(entryIndices(query(handler, { query: "endpoint", endpoint: "shop.price" }))).toEqual([1, 2]);
    expect(entryIndices(query(handler, { query: "minInfoCount", count: 1 }))).toEqual([3]);
    expect(entryIndices(query(handler, { query: "timeRange", startMs: 0, endMs: 999 }))).toEqual([]);
    expect(entryIndices(query(handler, { query: "timeRange", startMs: 1_000, endMs: 1_000 }))).toEqual([1, 2, 3]);
  });

  it("should return statistics", async () => {
    const { handler } = await seeded();
    const reply = query(handler, { query: "stats" });
    expect(reply).toEqual({
      ok: true,
      stats: {
        totalEntries: 3,
        entriesWithErrors: 1,
        totalInfo: 1,
        totalErrors: 1,
        perEndpoint: { "shop.price": 2, "chat.ping": 1 },
        perStatus: { pending: 0, completed: 2, rejected: 1, failed: 0 },
        oldestIndex: 1,
        newestIndex: 3,
        capacity: 1000,
      },
    });
  });

  it("should reject malformed queries", () => {
    const { handler } = setup();
    expect(handleAdminQuery({ body: "nope", handler, log: silentLogger })).toEqual({
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid JSON body" },
    });
    expect(query(handler, { query: "bogus" })).toMatchObject({
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid admin query" },
    });
    expect(query(handler, { query: "minInfoCount", count: -1 })).toMatchObject({ ok: false });
  });
});
