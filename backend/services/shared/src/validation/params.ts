// backend/services/shared/src/validation/params.ts
import { z } from "zod";

/** Path segment holding a non-negative integer id ("7" → 7). */
export const zIntParam = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((s) => Number(s));

export const IdParams = z.object({ id: zIntParam });
