/**
 * Unit tests for per-endpoint middleware gates.
 */

import { describe, it, expect, vi } from "vitest";
import { ConfigStore } from "./config-store.js";
import { EventLog } from "./event-log.js";
import { MiddlewareChain, type GateCall } from "./middleware-chain.js";
import type { Logger } from "./logger.js";

const silentLogger = {
  get: (): Logger => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function setup() {
  const config = new ConfigStore({ loggerFactory: silentLogger });
  const eventLog = new EventLog({ config, clock: { now: () => 0 }, loggerFactory: silentLogger });
  const chain = new MiddlewareChain({ eventLog, loggerFactory: silentLogger });
  const logIndex = eventLog.record("p1", "shop.purchase");
  const call: GateCall = {
    callerId: "p1",
    logIndex,
    endpoint: { name: "shop.purchase", kind: "function" },
    args: ["iron_sword", 1],
  };
  return { eventLog, chain, call, logIndex };
}

describe("MiddlewareChain", () => {
  it("should accept when an endpoint has no gates", () => {
    const { chain, call } = setup();
    expect(chain.run(call)).toEqual({ accepted: true });
  });

  it("should run gates in order and pass the call through", () => {
    const { chain, call } = setup();
    const seen: string[] = [];
    chain.add("shop.purchase", (c) => {
      seen.push(`first:${c.callerId}`);
      return true;
    });
    chain.add("shop.purchase", (c) => {
      seen.push(`second:${String(c.args[0])}`);
      return true;
    });
    expect(chain.run(call)).toEqual({ accepted: true });
    expect(seen).toEqual(["first:p1", "second:iron_sword"]);
  });

  it("should stop at the first rejecting gate", () => {
    const { chain, call, eventLog, logIndex } = setup();
    const third = vi.fn(() => true);
    chain.add("shop.purchase", () => true);
    chain.add("shop.purchase", () => false);
    chain.add("shop.purchase", third);
    expect(chain.run(call)).toEqual({
      accepted: false,
      gateIndex: 1,
      threw: false,
      message: "rejected by gate #2",
    });
    expect(third).not.toHaveBeenCalled();
    expect(eventLog.get(logIndex)?.events).toEqual([]);
  });

  it("should treat a throwing gate as a reject and log it", () => {
    const { chain, call, eventLog, logIndex } = setup();
    chain.add("shop.purchase", () => {
      throw new Error("lookup failed");
    });
    expect(chain.run(call)).toEqual({
      accepted: false,
      gateIndex: 0,
      threw: true,
      message: "gate #1 threw: lookup failed",
    });
    expect(eventLog.get(logIndex)?.events).toEqual([
      { level: "error", message: "gate #1 threw: lookup failed", code: "MIDDLEWARE_REJECTED", timestamp: 0 },
    ]);
  });

  it("should not extend a running chain with gates added during the run", () => {
    const { chain, call } = setup();
    const late = vi.fn(() => false);
    chain.add("shop.purchase", () => {
      chain.add("shop.purchase", late);
      return true;
    });
    expect(chain.run(call)).toEqual({ accepted: true });
    expect(late).not.toHaveBeenCalled();
    expect(chain.size("shop.purchase")).toBe(2);
  });

  it("should keep chains per endpoint", () => {
    const { chain } = setup();
    chain.add("a", () => true);
    chain.add("a", () => true);
    chain.add("b", () => true);
    expect(chain.size("a")).toBe(2);
    expect(chain.size("b")).toBe(1);
    expect(chain.size("missing")).toBe(0);
  });
});
