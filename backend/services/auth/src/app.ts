// backend/services/auth/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import { mountAuthRoutes } from "./routes/authRoutes";

export const SERVICE_NAME = "auth";

export function createAuthApp(deps: { log: Logger }): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountAuthRoutes(r, deps.log),
  });
}
