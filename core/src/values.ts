/**
 * Call values: the positional arguments a remote caller sends.
 *
 * Arguments arrive as decoded JSON (or as host values of the same shapes),
 * so every value is classified into a tag once and the validator only ever
 * compares tags against descriptors.
 */

export type CallTable = { [key: string]: unknown } | unknown[];

export type CallValue = string | number | boolean | CallTable | null | undefined;

export type ValueTag = "string" | "number" | "boolean" | "table" | "nil" | "unsupported";

export type CallerId = string;

function isTable(value: unknown): value is CallTable {
  if (Array.isArray(value)) return true;
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value. `null` and `undefined` are both absence.
 */
export function valueTag(value: unknown): ValueTag {
  if (value === undefined || value === null) return "nil";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    case "object":
      return isTable(value) ? "table" : "unsupported";
    default:
      return "unsupported";
  }
}

/** Short printable form of a value for log messages. */
export function describeValue(value: unknown): string {
  const tag = valueTag(value);
  switch (tag) {
    case "nil":
      return "nil";
    case "string":
      return JSON.stringify(value);
    case "number":
    case "boolean":
      return String(value);
    case "table":
      return Array.isArray(value) ? "table(array)" : "table";
    default:
      return typeof value;
  }
}

/** Values the pipeline can carry; anything else is rejected by every descriptor. */
export function isCallValue(value: unknown): value is CallValue {
  return valueTag(value) !== "unsupported";
}
