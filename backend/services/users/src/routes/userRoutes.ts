// backend/services/users/src/routes/userRoutes.ts
/**
 * GET  /users          list
 * GET  /users/:id      one (404 "User not found")
 * POST /users          create → 201; username and email are unique
 */

import type { Router } from "express";
import { asyncHandler } from "@shared/http/asyncHandler";
import { BadRequest, NotFound } from "@shared/problem/problem";
import type { IRepo } from "@shared/repo/IRepo";
import { IdParams } from "@shared/validation/params";
import { parseOrThrow } from "@shared/validation/validate";
import { createUserDto, type User, type UserCreate } from "../validators/user.dto";

export function mountUserRoutes(r: Router, repo: IRepo<User, UserCreate>): void {
  r.get(
    "/users",
    asyncHandler(async (_req, res) => {
      res.json(await repo.list());
    })
  );

  r.get(
    "/users/:id",
    asyncHandler(async (req, res) => {
      const { id } = parseOrThrow(IdParams, req.params, "path params");
      const user = await repo.get(id);
      if (!user) throw new NotFound("User not found");
      res.json(user);
    })
  );

  r.post(
    "/users",
    asyncHandler(async (req, res) => {
      const input = parseOrThrow(createUserDto, req.body);
      const clash = (await repo.list()).some(
        (u) => u.username === input.username || u.email === input.email
      );
      if (clash) {
        throw new BadRequest("User with same username or email already exists");
      }
      res.status(201).json(await repo.create(input));
    })
  );
}
