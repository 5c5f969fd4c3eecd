import { z } from 'zod';

/**
 * Strict JSON-serializable value type.
 * Only these types may live in graph state, interrupt payloads and resume
 * decisions, so every checkpoint can be written to disk and read back
 * unchanged (no functions, classes, Dates, Maps, Sets, etc.).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);
