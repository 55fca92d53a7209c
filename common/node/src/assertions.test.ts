/**
 * Unit tests for callback assertion helpers.
 */

import { describe, it, expect, vi } from "vitest";
import { isFirewallError } from "@remote-firewall/core";
import { Assertions } from "./assertions.js";
import { ConfigStore } from "./config-store.js";
import { EventLog } from "./event-log.js";
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
  const assertions = new Assertions(eventLog);
  const logIndex = eventLog.record("p1", "ep");
  const messages = () => eventLog.get(logIndex)?.events.map((e) => e.message) ?? [];
  return { eventLog, assertions, logIndex, messages };
}

describe("Assertions", () => {
  it("should write nothing when a check passes", () => {
    const { assertions, logIndex, eventLog } = setup();
    expect(assertions.assertInRange(logIndex, 5, 1, 10)).toBe(true);
    expect(assertions.assertInList(logIndex, "team", ["global", "team"])).toBe(true);
    expect(assertions.assertStringPattern(logIndex, "abc", /^[a-z]+$/)).toBe(true);
    expect(assertions.assertStringLength(logIndex, "hey", 1, 3)).toBe(true);
    expect(assertions.assertType(logIndex, 3, "integer")).toBe(true);
    expect(assertions.assertNotNil(logIndex, 0)).toBe(true);
    expect(eventLog.get(logIndex)?.errorCount).toBe(0);
  });

  it("should record an ASSERTION_FAILED error on failure", () => {
    const { assertions, logIndex, eventLog } = setup();
    expect(assertions.assertInRange(logIndex, 11, 1, 10)).toBe(false);
    expect(eventLog.get(logIndex)?.events).toEqual([
      {
        level: "error",
        message: "assertInRange: 11 is not within [1, 10]",
        code: "ASSERTION_FAILED",
        timestamp: 0,
      },
    ]);
  });

  it("should describe each failure", () => {
    const { assertions, logIndex, messages } = setup();
    assertions.assertInRange(logIndex, "5", 1, 10);
    assertions.assertInList(logIndex, "dm", ["global", "team", "trade"]);
    assertions.assertStringPattern(logIndex, 42, "^a");
    assertions.assertStringPattern(logIndex, "Zed", /^[a-z]+$/);
    assertions.assertStringLength(logIndex, "", 1, 200);
    assertions.assertType(logIndex, 2.5, "string|integer");
    assertions.assertNotNil(logIndex, null);
    expect(messages()).toEqual([
      'assertInRange: "5" is not within [1, 10]',
      'assertInList: "dm" is not one of 3 allowed values',
      "assertStringPattern: expected string, got 42",
      'assertStringPattern: "Zed" does not match /^[a-z]+$/',
      "assertStringLength: length 0 is not within [1, 200]",
      "assertType: expected string|integer, got 2.5",
      "assertNotNil: value is nil",
    ]);
  });

  it("should prefix failures with the label", () => {
    const { assertions, logIndex, messages } = setup();
    assertions.assertStringLength(logIndex, "x".repeat(5), 1, 3, "message");
    expect(messages()).toEqual(["assertStringLength(message): length 5 is not within [1, 3]"]);
  });

  it("should report an invalid string pattern as a failure", () => {
    const { assertions, logIndex, messages } = setup();
    expect(assertions.assertStringPattern(logIndex, "abc", "(")).toBe(false);
    expect(messages()).toEqual(['assertStringPattern: invalid pattern "("']);
  });

  it("should not depend on the state of a global regex", () => {
    const { assertions, logIndex } = setup();
    const pattern = /a/g;
    expect(assertions.assertStringPattern(logIndex, "a", pattern)).toBe(true);
    expect(assertions.assertStringPattern(logIndex, "a", pattern)).toBe(true);
  });

  it("should still check when the handle is absent or evicted", () => {
    const { assertions } = setup();
    expect(assertions.assertNotNil(undefined, undefined)).toBe(false);
    expect(assertions.assertInRange(999, 1, 0, 2)).toBe(true);
    expect(assertions.assertInRange(999, 5, 0, 2)).toBe(false);
  });

  it("should throw SPEC_ERROR for a malformed type token", () => {
    const { assertions, logIndex } = setup();
    let caught: unknown;
    try {
      assertions.assertType(logIndex, 1, "range[");
    } catch (err) {
      caught = err;
    }
    expect(isFirewallError(caught, "SPEC_ERROR")).toBe(true);
  });
});
