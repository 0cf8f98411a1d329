// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Shared app builder for every service. Assembles the same stack in the
 *   same order:
 *     http logger (request id) → health → json parser → routes → 404 → error handler
 *
 * Notes:
 * - No listen() here; entrypoints call startHttpService() and tests hand the
 *   app straight to supertest.
 * - Health stays ahead of the body parser and any auth the routes add.
 *   The gateway opts out and serves its aggregate /health as a route.
 */

import express, { type Express, type Router } from "express";
import type { Logger } from "../logger/logger";
import { makeHttpLogger } from "../middleware/httpLogger";
import { createHealthRouter } from "../health/health";
import { errorProblemJson, notFoundProblemJson } from "../problem/problemJson";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "gateway", "tasks"). Used in logs and health. */
  serviceName: string;
  log: Logger;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: Router) => void;
  /** Mount the liveness GET /health (false when the service owns /health). */
  health?: boolean;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, log, mountRoutes, health = true } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger(serviceName, log));
  if (health) app.use(createHealthRouter(serviceName));

  app.use(express.json({ limit: "1mb" }));

  const api = express.Router();
  mountRoutes(api);
  app.use(api);

  app.use(notFoundProblemJson());
  app.use(errorProblemJson(log));

  return app;
}
