// backend/services/comments/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import { notifierFromEnv, type INotifier } from "@shared/notify/notifier";
import type { IRepo } from "@shared/repo/IRepo";
import { InMemoryRepo } from "@shared/repo/InMemoryRepo";
import seed from "./seed/comments.json";
import { mountCommentRoutes } from "./routes/commentRoutes";
import { commentDto, type Comment, type CommentCreate } from "./validators/comment.dto";

export const SERVICE_NAME = "comments";

export function createCommentRepo(rows: readonly Comment[] = commentDto.array().parse(seed)) {
  return new InMemoryRepo<Comment, CommentCreate>((id, input) => ({ id, ...input }), rows);
}

export function createCommentsApp(deps: {
  log: Logger;
  repo?: IRepo<Comment, CommentCreate>;
  notifier?: INotifier;
}): Express {
  const repo = deps.repo ?? createCommentRepo();
  const notifier = deps.notifier ?? notifierFromEnv(deps.log);
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountCommentRoutes(r, { repo, notifier }),
  });
}
