// backend/services/projects/src/routes/projectRoutes.ts
import type { Router } from "express";
import { asyncHandler } from "@shared/http/asyncHandler";
import { NotFound } from "@shared/problem/problem";
import type { IRepo } from "@shared/repo/IRepo";
import { IdParams } from "@shared/validation/params";
import { parseOrThrow } from "@shared/validation/validate";
import {
  createProjectDto,
  type Project,
  type ProjectCreate,
} from "../validators/project.dto";

export function mountProjectRoutes(r: Router, repo: IRepo<Project, ProjectCreate>): void {
  r.get(
    "/projects",
    asyncHandler(async (_req, res) => {
      res.json(await repo.list());
    })
  );

  r.get(
    "/projects/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      const project = await repo.get(id);
      if (!project) throw new NotFound("Project not found");
      res.json(project);
    })
  );

  r.post(
    "/projects",
    asyncHandler(async (req, res) => {
      const input = parseOrThrow(createProjectDto, req.body);
      res.status(201).json(await repo.create(input));
    })
  );

  r.delete(
    "/projects/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      if (!(await repo.delete(id))) throw new NotFound("Project not found");
      res.status(204).end();
    })
  );
}
