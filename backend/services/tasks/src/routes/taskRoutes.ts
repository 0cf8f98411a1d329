// backend/services/tasks/src/routes/taskRoutes.ts
/**
 * GET    /tasks
 * GET    /tasks/:id
 * GET    /projects/:projectId/tasks
 * POST   /tasks          → 201, status "todo"; notifies the assignee
 * PATCH  /tasks/:id      partial; null fields are ignored
 * DELETE /tasks/:id      → 204
 *
 * The assignment notice goes out after the 201 is committed and never
 * affects it.
 */

import type { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/http/asyncHandler";
import type { INotifier } from "@shared/notify/notifier";
import { NotFound } from "@shared/problem/problem";
import type { IRepo } from "@shared/repo/IRepo";
import { IdParams, zIntParam } from "@shared/validation/params";
import { parseOrThrow } from "@shared/validation/validate";
import {
  createTaskDto,
  updateTaskDto,
  type Task,
  type TaskCreate,
  type TaskUpdate,
} from "../validators/task.dto";

const ProjectIdParams = z.object({ projectId: zIntParam });

type TaskPatch = Partial<Omit<Task, "id">>;

function toPatch(u: TaskUpdate): TaskPatch {
  const patch: TaskPatch = {};
  if (u.title != null) patch.title = u.title;
  if (u.description != null) patch.description = u.description;
  if (u.status != null) patch.status = u.status;
  if (u.assignee_id != null) patch.assignee_id = u.assignee_id;
  return patch;
}

export function assignmentMessage(title: string): string {
  return `You have been assigned a task: ${title}`;
}

export function mountTaskRoutes(
  r: Router,
  deps: { repo: IRepo<Task, TaskCreate>; notifier: INotifier }
): void {
  const { repo, notifier } = deps;

  r.get(
    "/tasks",
    asyncHandler(async (_req, res) => {
      res.json(await repo.list());
    })
  );

  r.get(
    "/tasks/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      const task = await repo.get(id);
      if (!task) throw new NotFound("Task not found");
      res.json(task);
    })
  );

  r.get(
    "/projects/:projectId/tasks",
    asyncHandler(async (req, res) => {
      const { projectId } = parseOrThrow(ProjectIdParams, req.params, "path params");
      const all = await repo.list();
      res.json(all.filter((t) => t.project_id === projectId));
    })
  );

  r.post(
    "/tasks",
    asyncHandler(async (req, res) => {
      const input = parseOrThrow(createTaskDto, req.body);
      const task = await repo.create(input);

      const assignee = task.assignee_id;
      if (assignee !== null) {
        res.once("finish", () => notifier.notify(assignee, assignmentMessage(task.title)));
      }
      res.status(201).json(task);
    })
  );

  r.patch(
    "/tasks/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      const patch = toPatch(parseOrThrow(updateTaskDto, req.body));
      const task = await repo.update(id, patch);
      if (!task) throw new NotFound("Task not found");
      res.json(task);
    })
  );

  r.delete(
    "/tasks/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      if (!(await repo.delete(id))) throw new NotFound("Task not found");
      res.status(204).end();
    })
  );
}
