// backend/services/comments/src/routes/commentRoutes.ts
/**
 * GET  /tasks/:taskId/comments
 * POST /tasks/:taskId/comments { author_id, text } → 201; notifies the author
 *
 * The task id is not checked against the tasks service.
 */

import type { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/http/asyncHandler";
import type { INotifier } from "@shared/notify/notifier";
import type { IRepo } from "@shared/repo/IRepo";
import { zIntParam } from "@shared/validation/params";
import { parseOrThrow } from "@shared/validation/validate";
import {
  createCommentDto,
  type Comment,
  type CommentCreate,
} from "../validators/comment.dto";

const TaskIdParams = z.object({ taskId: zIntParam });

export function commentAddedMessage(taskId: number): string {
  return `Your comment was added to task ${taskId}`;
}

export function mountCommentRoutes(
  r: Router,
  deps: { repo: IRepo<Comment, CommentCreate>; notifier: INotifier }
): void {
  const { repo, notifier } = deps;

  r.get(
    "/tasks/:taskId/comments",
    asyncHandler(async (req, res) => {
      const { taskId } = parseOrThrow(TaskIdParams, req.params, "path params");
      const all = await repo.list();
      res.json(all.filter((c) => c.task_id === taskId));
    })
  );

  r.post(
    "/tasks/:taskId/comments",
    asyncHandler(async (req, res) => {
      const { taskId } = parseOrThrow(TaskIdParams, req.params, "path params");
      const body = parseOrThrow(createCommentDto, req.body);
      const comment = await repo.create({ ...body, task_id: taskId });

      res.once("finish", () =>
        notifier.notify(comment.author_id, commentAddedMessage(taskId))
      );
      res.status(201).json(comment);
    })
  );
}
