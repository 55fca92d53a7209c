/**
 * Example endpoints wired from config.example.json.
 */

import { fileURLToPath } from "node:url";
import { beforeEach, describe, it, expect, vi } from "vitest";
import { RemoteHandler, type Logger } from "@remote-firewall/common";
import { registerEndpoints } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { registerExampleHandlers } from "./example-handlers.js";
import { clearHandlers } from "./handler-registry.js";

const EXAMPLE_PATH = fileURLToPath(new URL("../../config.example.json", import.meta.url));

const silentLogger = {
  get: (): Logger => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function setup() {
  const handler = new RemoteHandler({ loggerFactory: silentLogger, clock: { now: () => 0 } });
  registerExampleHandlers({ handler, bannedCallers: ["griefer"] });
  const config = loadConfig({ env: { CONFIG_PATH: EXAMPLE_PATH }, log: silentLogger });
  handler.configure(config.firewall);
  registerEndpoints({ handler, definitions: config.endpoints, log: silentLogger });

  const lastMessages = (endpoint: string): string[] => {
    const entries = handler.eventLog.retrieveByEndpoint(endpoint);
    return entries[entries.length - 1]?.events.map((e) => e.message) ?? [];
  };
  return { handler, lastMessages };
}

describe("example handlers", () => {
  beforeEach(() => {
    clearHandlers();
  });

  it("should register every endpoint in the example file", () => {
    const { handler } = setup();
    expect(handler.endpointNames()).toEqual(["shop.purchase", "chat.send", "inventory.equip"]);
    expect(handler.config.get().maxLogCount).toBe(2000);
  });

  describe("shop.purchase", () => {
    it("should return a receipt and log the purchase", async () => {
      const { handler, lastMessages } = setup();
      expect(await handler.call("shop.purchase", "alice", ["iron_sword", 2])).toEqual({
        ok: true,
        value: { itemId: "iron_sword", qty: 2, total: 240 },
      });
      expect(lastMessages("shop.purchase")).toEqual(["purchased 2 x iron_sword"]);
    });

    it("should turn away banned callers", async () => {
      const { handler } = setup();
      expect(await handler.call("shop.purchase", "griefer", ["iron_sword", 1])).toEqual({
        ok: false,
        error: { code: "MIDDLEWARE_REJECTED", message: "rejected by gate #1", stage: "middleware" },
      });
    });

    it("should record assertion failures and return nothing", async () => {
      const { handler, lastMessages } = setup();
      expect(await handler.call("shop.purchase", "alice", ["Iron Sword", 1])).toEqual({ ok: true });
      expect(lastMessages("shop.purchase")).toEqual([
        'assertStringPattern(itemId): "Iron Sword" does not match /^[a-z][a-z0-9_]{2,31}$/',
      ]);
      expect(await handler.call("shop.purchase", "alice", ["gold_bar", 1])).toEqual({ ok: true });
      expect(lastMessages("shop.purchase")).toEqual(["assertNotNil(price): value is nil"]);
    });

    it("should apply the endpoint's own rate limit", async () => {
      const { handler } = setup();
      for (let i = 0; i < 5; i++) {
        expect((await handler.call("shop.purchase", "bob", ["health_potion", 1])).ok).toBe(true);
      }
      expect(await handler.call("shop.purchase", "bob", ["health_potion", 1])).toEqual({
        ok: false,
        error: { code: "RATE_LIMITED", message: "rate limit exceeded", stage: "rateLimit" },
      });
    });
  });

  describe("chat.send", () => {
    it("should default to the global channel", async () => {
      const { handler, lastMessages } = setup();
      await handler.fire("chat.send", "alice", ["hi"]);
      expect(lastMessages("chat.send")).toEqual(["alice -> #global"]);
    });

    it("should reject unknown channels and empty messages", async () => {
      const { handler, lastMessages } = setup();
      await handler.fire("chat.send", "alice", ["hi", "dm"]);
      expect(lastMessages("chat.send")).toEqual(['assertInList(channel): "dm" is not one of 3 allowed values']);
      await handler.fire("chat.send", "alice", [""]);
      expect(lastMessages("chat.send")).toEqual(["assertStringLength(message): length 0 is not within [1, 200]"]);
    });
  });

  describe("inventory.equip", () => {
    it("should equip into a known slot", async () => {
      const { handler, lastMessages } = setup();
      await handler.fire("inventory.equip", "alice", ["weapon", 42]);
      expect(lastMessages("inventory.equip")).toEqual(["equipped 42 in weapon"]);
    });

    it("should reject unknown slots", async () => {
      const { handler, lastMessages } = setup();
      await handler.fire("inventory.equip", "alice", ["feet", "boots"]);
      expect(lastMessages("inventory.equip")).toEqual([
        'assertInList(slot): "feet" is not one of 4 allowed values',
      ]);
    });
  });
});
