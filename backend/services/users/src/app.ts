// backend/services/users/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import type { IRepo } from "@shared/repo/IRepo";
import { InMemoryRepo } from "@shared/repo/InMemoryRepo";
import seed from "./seed/users.json";
import { mountUserRoutes } from "./routes/userRoutes";
import { userDto, type User, type UserCreate } from "./validators/user.dto";

export const SERVICE_NAME = "users";

export function createUserRepo(rows: readonly User[] = userDto.array().parse(seed)) {
  return new InMemoryRepo<User, UserCreate>((id, input) => ({ id, ...input }), rows);
}

export function createUsersApp(deps: {
  log: Logger;
  repo?: IRepo<User, UserCreate>;
}): Express {
  const repo = deps.repo ?? createUserRepo();
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountUserRoutes(r, repo),
  });
}
