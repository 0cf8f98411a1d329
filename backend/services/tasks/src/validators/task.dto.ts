// backend/services/tasks/src/validators/task.dto.ts
import { z } from "zod";

export const TASK_STATUSES = ["todo", "in_progress", "done"] as const;
export const taskStatus = z.enum(TASK_STATUSES);

export const taskDto = z.object({
  id: z.number().int().nonnegative(),
  project_id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  status: taskStatus,
  assignee_id: z.number().int().nullable(),
});

export const createTaskDto = z.object({
  project_id: z.number().int(),
  title: z.string(),
  description: z.string().nullish().transform((v) => v ?? null),
  assignee_id: z.number().int().nullish().transform((v) => v ?? null),
});

/** Null and absent both mean "leave as is". */
export const updateTaskDto = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  status: taskStatus.nullish(),
  assignee_id: z.number().int().nullish(),
});

export type TaskStatus = z.infer<typeof taskStatus>;
export type Task = z.infer<typeof taskDto>;
export type TaskCreate = z.infer<typeof createTaskDto>;
export type TaskUpdate = z.infer<typeof updateTaskDto>;
