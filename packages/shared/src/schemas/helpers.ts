/**
 * Small combinators shared by the backend payload schemas. The backend
 * omits or nulls optional columns inconsistently, so optional fields are
 * normalized to `null` and counters default to 0.
 */

import { z } from "zod";

/** Accepts undefined or null and always yields `T | null`. */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | null => value ?? null);
}

/** Non-negative number defaulting to 0 when absent or null. */
export const counter = z
  .number()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? 0);

/** Ids come back as strings or numbers depending on the table. */
export const idSchema = z.union([z.string().min(1), z.number()]).transform(String);
