// backend/services/projects/src/validators/project.dto.ts
import { z } from "zod";

export const projectDto = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  description: z.string().nullable(),
  owner_id: z.number().int(),
});

export const createProjectDto = z.object({
  name: z.string(),
  description: z.string().nullish().transform((v) => v ?? null),
  owner_id: z.number().int(),
});

export type Project = z.infer<typeof projectDto>;
export type ProjectCreate = z.infer<typeof createProjectDto>;
