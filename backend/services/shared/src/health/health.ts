// backend/services/shared/src/health/health.ts
/**
 * Exposes:
 *   GET /health -> { status: "ok", service }
 *
 * Liveness only; the gateway's aggregate health treats any 2xx JSON body
 * from here as "ok".
 */

import { Router } from "express";

export function createHealthRouter(service: string): Router {
  const router = Router();
  router.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service });
  });
  return router;
}
