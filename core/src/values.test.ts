/**
 * Unit tests for call value classification.
 */

import { describe, it, expect } from "vitest";
import { describeValue, isCallValue, valueTag } from "./values.js";
import { errorMessage } from "./errors.js";

describe("valueTag", () => {
  it("should classify JSON shapes", () => {
    expect(valueTag("a")).toBe("string");
    expect(valueTag(0)).toBe("number");
    expect(valueTag(true)).toBe("boolean");
    expect(valueTag({})).toBe("table");
    expect(valueTag(Object.create(null))).toBe("table");
    expect(valueTag([])).toBe("table");
    expect(valueTag(null)).toBe("nil");
    expect(valueTag(undefined)).toBe("nil");
  });

  it("should mark host objects and functions unsupported", () => {
    expect(valueTag(new Map())).toBe("unsupported");
    expect(valueTag(() => 1)).toBe("unsupported");
    expect(valueTag(Symbol("s"))).toBe("unsupported");
    expect(isCallValue(new Date(0))).toBe(false);
    expect(isCallValue(null)).toBe(true);
  });
});

describe("describeValue", () => {
  it("should print short forms", () => {
    expect(describeValue("hi")).toBe('"hi"');
    expect(describeValue(2.5)).toBe("2.5");
    expect(describeValue(false)).toBe("false");
    expect(describeValue({ a: 1 })).toBe("table");
    expect(describeValue([1])).toBe("table(array)");
    expect(describeValue(undefined)).toBe("nil");
    expect(describeValue(() => 1)).toBe("function");
  });
});

describe("errorMessage", () => {
  it("should extract a message from any thrown value", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage({ code: 1 })).toBe('{"code":1}');
    expect(errorMessage(undefined)).toBe("undefined");
  });
});
