/**
 * Assertion helpers for application callbacks.
 *
 * Each helper checks one condition against the current call's log handle.
 * On failure it appends an ASSERTION_FAILED error sub-event to that entry
 * and returns false; on success it returns true and writes nothing. A handle
 * that is absent or already evicted makes the write a no-op, never the check.
 */

import {
  describeValue,
  parseTypeToken,
  valueTag,
  type LogIndex,
} from "@remote-firewall/core";
import type { EventLog } from "./event-log.js";
import { checkValue } from "./validator.js";

function prefix(helper: string, label?: string): string {
  return label ? `${helper}(${label})` : helper;
}

export class Assertions {
  constructor(private readonly eventLog: EventLog) {}

  /** Numeric value with `min <= value <= max`. */
  assertInRange(logIndex: LogIndex | undefined, value: unknown, min: number, max: number, label?: string): boolean {
    if (typeof value === "number" && value >= min && value <= max) return true;
    return this.fail(logIndex, `${prefix("assertInRange", label)}: ${describeValue(value)} is not within [${min}, ${max}]`);
  }

  /** Value strictly equal to one of `list`. */
  assertInList(logIndex: LogIndex | undefined, value: unknown, list: readonly unknown[], label?: string): boolean {
    if (list.some((item) => item === value)) return true;
    return this.fail(
      logIndex,
      `${prefix("assertInList", label)}: ${describeValue(value)} is not one of ${list.length} allowed values`
    );
  }

  /** String value matching `pattern`; a string pattern is compiled without flags. */
  assertStringPattern(
    logIndex: LogIndex | undefined,
    value: unknown,
    pattern: RegExp | string,
    label?: string
  ): boolean {
    const name = prefix("assertStringPattern", label);
    if (typeof value !== "string") {
      return this.fail(logIndex, `${name}: expected string, got ${describeValue(value)}`);
    }
    let regex: RegExp;
    try {
      regex = typeof pattern === "string" ? new RegExp(pattern) : pattern;
    } catch {
      return this.fail(logIndex, `${name}: invalid pattern ${JSON.stringify(pattern)}`);
    }
    regex.lastIndex = 0;
    if (regex.test(value)) return true;
    return this.fail(logIndex, `${name}: ${describeValue(value)} does not match ${String(regex)}`);
  }

  /** String value whose length is within `[min, max]`. */
  assertStringLength(
    logIndex: LogIndex | undefined,
    value: unknown,
    min: number,
    max: number,
    label?: string
  ): boolean {
    const name = prefix("assertStringLength", label);
    if (typeof value !== "string") {
      return this.fail(logIndex, `${name}: expected string, got ${describeValue(value)}`);
    }
    if (value.length >= min && value.length <= max) return true;
    return this.fail(logIndex, `${name}: length ${value.length} is not within [${min}, ${max}]`);
  }

  /**
   * Value matching a type token from the parameter grammar (`"integer"`,
   * `"string|number"`, `"range[1,5]"`, ...). A malformed token throws SPEC_ERROR.
   */
  assertType(logIndex: LogIndex | undefined, value: unknown, typeToken: string, label?: string): boolean {
    const reason = checkValue(parseTypeToken(typeToken), value);
    if (reason === null) return true;
    return this.fail(logIndex, `${prefix("assertType", label)}: ${reason}`);
  }

  assertNotNil(logIndex: LogIndex | undefined, value: unknown, label?: string): boolean {
    if (valueTag(value) !== "nil") return true;
    return this.fail(logIndex, `${prefix("assertNotNil", label)}: value is nil`);
  }

  private fail(logIndex: LogIndex | undefined, message: string): false {
    this.eventLog.error(logIndex, message, "ASSERTION_FAILED");
    return false;
  }
}
