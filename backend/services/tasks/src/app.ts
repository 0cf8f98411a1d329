// backend/services/tasks/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import { notifierFromEnv, type INotifier } from "@shared/notify/notifier";
import type { IRepo } from "@shared/repo/IRepo";
import { InMemoryRepo } from "@shared/repo/InMemoryRepo";
import seed from "./seed/tasks.json";
import { mountTaskRoutes } from "./routes/taskRoutes";
import { taskDto, type Task, type TaskCreate } from "./validators/task.dto";

export const SERVICE_NAME = "tasks";

export function createTaskRepo(rows: readonly Task[] = taskDto.array().parse(seed)) {
  return new InMemoryRepo<Task, TaskCreate>(
    (id, input) => ({ id, ...input, status: "todo" }),
    rows
  );
}

export function createTasksApp(deps: {
  log: Logger;
  repo?: IRepo<Task, TaskCreate>;
  notifier?: INotifier;
}): Express {
  const repo = deps.repo ?? createTaskRepo();
  const notifier = deps.notifier ?? notifierFromEnv(deps.log);
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountTaskRoutes(r, { repo, notifier }),
  });
}
