// backend/services/shared/src/validation/validate.ts
import type { z } from "zod";
import { BadRequest } from "../problem/problem";

/**
 * Parse with a zod schema or throw a 400 problem carrying the issue list.
 * `what` names the input in the detail ("body", "path params").
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what = "body"
): z.output<S> {
  const r = schema.safeParse(value);
  if (!r.success) {
    throw new BadRequest(
      `Invalid ${what}`,
      r.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    );
  }
  return r.data;
}
