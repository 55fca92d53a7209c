// Values
export * from "./values.js";

// Errors
export * from "./errors.js";

// Parameter type grammar
export * from "./type-spec.js";

// Configuration schema
export * from "./config-schema.js";

// Endpoint definitions
export * from "./endpoint.js";

// Log entry types
export * from "./log-entry.js";

// Outcomes
export * from "./outcome.js";

// Wire protocol (NATS call/admin request/response)
export * from "./wire.js";

// Wire Zod schemas (runtime validation)
export { RemoteCallSchema, AdminQuerySchema } from "./wire-schema.js";
