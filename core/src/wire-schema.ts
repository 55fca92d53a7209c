/**
 * Zod runtime schemas for the wire types in wire.ts.
 *
 * Incoming NATS messages are decoded with these before anything reaches
 * the firewall pipeline.
 */

import { z } from "zod";

export const RemoteCallSchema = z.object({
  callerId: z.string().min(1),
  args: z.array(z.unknown()).optional(),
});

export const AdminQuerySchema = z.discriminatedUnion("query", [
  z.object({ query: z.literal("all") }),
  z.object({ query: z.literal("sender"), callerId: z.string().min(1) }),
  z.object({ query: z.literal("timeRange"), startMs: z.number(), endMs: z.number() }),
  z.object({ query: z.literal("minInfoCount"), count: z.number().int().nonnegative() }),
  z.object({ query: z.literal("endpoint"), endpoint: z.string().min(1) }),
  z.object({ query: z.literal("stats") }),
]);
