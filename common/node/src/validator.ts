/**
 * Positional argument validation against a compiled parameter spec.
 *
 * Validation never throws: a mismatch is returned as a ValidationFailure and
 * the dispatcher turns it into a rejected call.
 */

import {
  describeValue,
  formatDescriptor,
  isCallValue,
  valueTag,
  type CallValue,
  type CompiledSpec,
  type PrimitiveType,
  type TypeDescriptor,
} from "@remote-firewall/core";

export interface ValidationFailure {
  /** Zero-based argument position */
  argIndex: number;
  argName: string;
  expected: string;
  reason: string;
}

export type ValidationResult =
  | { ok: true; args: CallValue[] }
  | { ok: false; error: ValidationFailure };

function matchesPrimitive(type: PrimitiveType, value: CallValue): boolean {
  const tag = valueTag(value);
  if (type === "integer") return tag === "number" && Number.isInteger(value);
  return tag === type;
}

/**
 * Check one value against a descriptor. Returns null when it matches, otherwise
 * the reason it does not. `any` accepts every call value (JSON-shaped data);
 * functions, Date, Map and other host objects are not call values and fail for
 * every descriptor.
 */
export function checkValue(descriptor: TypeDescriptor, value: unknown): string | null {
  if (!isCallValue(value)) {
    return `unsupported value type ${describeValue(value)}`;
  }
  const absent = valueTag(value) === "nil";

  switch (descriptor.kind) {
    case "any":
      return null;
    case "optional":
      return absent ? null : checkValue(descriptor.inner, value);
    default:
      break;
  }

  if (absent) return "missing required value";

  const expected = formatDescriptor(descriptor);
  switch (descriptor.kind) {
    case "primitive":
      return matchesPrimitive(descriptor.type, value)
        ? null
        : `expected ${expected}, got ${describeValue(value)}`;
    case "union":
      return descriptor.types.some((type) => matchesPrimitive(type, value))
        ? null
        : `expected ${expected}, got ${describeValue(value)}`;
    case "range":
      if (typeof value !== "number") {
        return `expected ${expected}, got ${describeValue(value)}`;
      }
      return value >= descriptor.min && value <= descriptor.max
        ? null
        : `${value} is outside range [${descriptor.min}, ${descriptor.max}]`;
  }
}

/**
 * Validate an argument tuple. Extra trailing arguments are ignored and dropped from
 * the returned list; missing trailing arguments are returned as `undefined`.
 */
export function validateArgs(spec: CompiledSpec, args: readonly unknown[]): ValidationResult {
  const out: CallValue[] = [];
  for (let i = 0; i < spec.params.length; i++) {
    const param = spec.params[i];
    const value = args[i];
    const reason = checkValue(param.descriptor, value);
    if (reason !== null) {
      return {
        ok: false,
        error: {
          argIndex: i,
          argName: param.name,
          expected: formatDescriptor(param.descriptor),
          reason,
        },
      };
    }
    out.push(isCallValue(value) ? value : undefined);
  }
  return { ok: true, args: out };
}
