import { z } from "zod";

export const WorkerRequestSchema = z.discriminatedUnion("type", [
  z.object({
    id: z.number().int(),
    type: z.literal("init"),
    payload: z.object({ words: z.array(z.string()), order: z.number().int().positive() })
  }),
  z.object({
    id: z.number().int(),
    type: z.literal("generate"),
    payload: z.object({
      count: z.number().int().nonnegative(),
      length: z.number().int().nonnegative(),
      maxAttempts: z.number().int().positive().optional()
    })
  })
]);

export const WorkerErrorKindSchema = z.enum([
  "not_found",
  "invalid_state",
  "invalid_config",
  "exhausted_transitions",
  "generation_exhausted",
  "invalid_request",
  "internal"
]);

export const WorkerResponseSchema = z.discriminatedUnion("type", [
  z.object({
    id: z.number().int(),
    type: z.literal("init:ok"),
    payload: z.object({ words: z.number(), prefixes: z.number() })
  }),
  z.object({
    id: z.number().int(),
    type: z.literal("generate:ok"),
    payload: z.object({ words: z.array(z.string()) })
  }),
  z.object({
    id: z.number().int(),
    type: z.literal("error"),
    payload: z.object({ kind: WorkerErrorKindSchema, message: z.string() })
  })
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;
export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
export type WorkerErrorKind = z.infer<typeof WorkerErrorKindSchema>;
