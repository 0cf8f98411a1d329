// backend/services/projects/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import type { IRepo } from "@shared/repo/IRepo";
import { InMemoryRepo } from "@shared/repo/InMemoryRepo";
import seed from "./seed/projects.json";
import { mountProjectRoutes } from "./routes/projectRoutes";
import { projectDto, type Project, type ProjectCreate } from "./validators/project.dto";

export const SERVICE_NAME = "projects";

export function createProjectRepo(rows: readonly Project[] = projectDto.array().parse(seed)) {
  return new InMemoryRepo<Project, ProjectCreate>((id, input) => ({ id, ...input }), rows);
}

export function createProjectsApp(deps: {
  log: Logger;
  repo?: IRepo<Project, ProjectCreate>;
}): Express {
  const repo = deps.repo ?? createProjectRepo();
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountProjectRoutes(r, repo),
  });
}
