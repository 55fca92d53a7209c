/**
 * Declarative parameter type grammar.
 *
 * Endpoints declare their arguments as ordered `[name, type]` pairs:
 *
 *   [["itemId", "string"], ["qty", "range[1,10]"], ["note", "string?"]]
 *
 * Type tokens:
 * - primitives: `string`, `number`, `boolean`, `table`, `integer`, `any`
 * - optional: a `?` or `nullable` suffix (`string?`, `string nullable`)
 * - union: `string|number` (primitives only; a trailing `?` applies to the whole union)
 * - range: `range[min,max]`, inclusive, numbers only
 *
 * Tokens are parsed once into frozen descriptors at registration.
 */

import { z } from "zod";
import { FirewallError } from "./errors.js";

// ── Descriptors ─────────────────────────────────────────────────────

export const PRIMITIVE_TYPES = ["string", "number", "boolean", "table", "integer"] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

export type PrimitiveDescriptor = { kind: "primitive"; type: PrimitiveType };
export type UnionDescriptor = { kind: "union"; types: readonly PrimitiveType[] };
export type RangeDescriptor = { kind: "range"; min: number; max: number };
export type AnyDescriptor = { kind: "any" };

/** Descriptors that reject absence. */
export type RequiredDescriptor = PrimitiveDescriptor | UnionDescriptor | RangeDescriptor;

export type OptionalDescriptor = { kind: "optional"; inner: RequiredDescriptor };

export type TypeDescriptor = RequiredDescriptor | OptionalDescriptor | AnyDescriptor;

export interface CompiledParam {
  name: string;
  /** Token as declared, for messages */
  token: string;
  descriptor: TypeDescriptor;
}

export interface CompiledSpec {
  params: readonly CompiledParam[];
}

// ── Input shape ─────────────────────────────────────────────────────

export type ParamSpecInput = ReadonlyArray<readonly [name: string, type: string]>;

export const ParamSpecInputSchema = z.array(
  z.tuple([z.string().min(1), z.string()])
);

// ── Parsing ─────────────────────────────────────────────────────────

const ANY: AnyDescriptor = { kind: "any" };
Object.freeze(ANY);

const RANGE_PATTERN = /^range\s*\[\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\]$/;

const NULLABLE_SUFFIX = "nullable";

function specError(token: string, reason: string): FirewallError {
  return new FirewallError({
    code: "SPEC_ERROR",
    message: `Invalid type "${token}": ${reason}`,
    details: { token, reason },
  });
}

function isPrimitive(token: string): token is PrimitiveType {
  return PRIMITIVE_TYPES.some((type) => type === token);
}

function stripOptional(raw: string): { body: string; optional: boolean } {
  if (raw.endsWith("?")) {
    return { body: raw.slice(0, -1).trimEnd(), optional: true };
  }
  if (raw.endsWith(NULLABLE_SUFFIX) && raw.length > NULLABLE_SUFFIX.length) {
    return { body: raw.slice(0, -NULLABLE_SUFFIX.length).trimEnd(), optional: true };
  }
  return { body: raw, optional: false };
}

function primitive(type: PrimitiveType): PrimitiveDescriptor {
  const descriptor: PrimitiveDescriptor = { kind: "primitive", type };
  return Object.freeze(descriptor);
}

function parseRange(body: string, token: string): RangeDescriptor {
  const match = RANGE_PATTERN.exec(body);
  if (!match) throw specError(token, "malformed range, expected range[min,max]");
  const min = Number(match[1]);
  const max = Number(match[2]);
  if (min > max) throw specError(token, `range minimum ${min} exceeds maximum ${max}`);
  const range: RangeDescriptor = { kind: "range", min, max };
  return Object.freeze(range);
}

function parseUnion(body: string, token: string): PrimitiveDescriptor | UnionDescriptor {
  const types: PrimitiveType[] = [];
  for (const part of body.split("|")) {
    const alt = part.trim();
    if (!alt) throw specError(token, "empty union alternative");
    if (alt === "any") throw specError(token, "any cannot appear in a union");
    if (!isPrimitive(alt)) throw specError(token, `unknown union alternative "${alt}"`);
    if (!types.includes(alt)) types.push(alt);
  }
  if (types.length === 1) return primitive(types[0]);
  const union: UnionDescriptor = { kind: "union", types: Object.freeze(types) };
  return Object.freeze(union);
}

function parseBody(body: string, token: string): RequiredDescriptor | AnyDescriptor {
  if (body === "any") return ANY;
  if (body.startsWith("range")) return parseRange(body, token);
  if (body.includes("|")) return parseUnion(body, token);
  if (isPrimitive(body)) return primitive(body);
  throw specError(token, "unknown type");
}

/**
 * Parse one type token into a descriptor. Throws SPEC_ERROR on malformed input.
 */
export function parseTypeToken(token: string): TypeDescriptor {
  const raw = token.trim();
  if (!raw) throw specError(token, "empty type token");
  const { body, optional } = stripOptional(raw);
  if (!body) throw specError(token, "missing type before optional marker");
  const descriptor = parseBody(body, token);
  if (descriptor.kind === "any") return descriptor;
  if (!optional) return descriptor;
  const wrapped: OptionalDescriptor = { kind: "optional", inner: descriptor };
  return Object.freeze(wrapped);
}

/**
 * Compile an ordered `[name, type]` list. Throws SPEC_ERROR when an entry is not a
 * name/type pair, a name repeats, or a type token is malformed.
 */
export function compileParamSpec(input: unknown): CompiledSpec {
  const parsed = ParamSpecInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new FirewallError({
      code: "SPEC_ERROR",
      message: "Parameter spec must be a list of [name, type] pairs",
      details: parsed.error.flatten(),
    });
  }

  const seen = new Set<string>();
  const params: CompiledParam[] = [];
  for (const [name, token] of parsed.data) {
    if (seen.has(name)) {
      throw new FirewallError({
        code: "SPEC_ERROR",
        message: `Duplicate parameter name "${name}"`,
        details: { name },
      });
    }
    seen.add(name);
    const param: CompiledParam = { name, token, descriptor: parseTypeToken(token) };
    params.push(Object.freeze(param));
  }
  const compiled: CompiledSpec = { params: Object.freeze(params) };
  return Object.freeze(compiled);
}

/** Canonical text of a descriptor. */
export function formatDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "any":
      return "any";
    case "primitive":
      return descriptor.type;
    case "union":
      return descriptor.types.join("|");
    case "range":
      return `range[${descriptor.min},${descriptor.max}]`;
    case "optional":
      return `${formatDescriptor(descriptor.inner)}?`;
  }
}
