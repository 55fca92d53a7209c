/**
 * Endpoint definitions: the declarative half of an endpoint registration.
 *
 * Definitions can be written in code or loaded from a JSON file; callbacks
 * and middleware gates are attached by name when the definition is registered.
 */

import { z } from "zod";

/** `event` is fire-and-forget, `function` is request/response. */
export type EndpointKind = "event" | "function";

export const RateLimitOverrideSchema = z
  .object({
    maxRequests: z.number().int().positive().optional(),
    /** Seconds */
    window: z.number().positive().optional(),
  })
  .strict();

export type RateLimitOverride = z.infer<typeof RateLimitOverrideSchema>;

export const EndpointDefinitionSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["event", "function"]),
  // Pairs are checked by compileParamSpec so malformed specs surface as SPEC_ERROR.
  params: z.array(z.unknown()).default([]),
  middleware: z.array(z.string().min(1)).default([]),
  forceLogging: z.boolean().default(false),
  rateLimit: RateLimitOverrideSchema.optional(),
});

export type EndpointDefinition = z.infer<typeof EndpointDefinitionSchema>;
