// backend/services/gateway/src/routes/gateway.routes.ts
/**
 * Purpose:
 * - The gateway's public surface:
 *     GET  /health                   public, aggregate map, always 200
 *     GET  /summary                  bearer, counts per resource
 *     GET  /me                       bearer, caller's user record
 *     POST /users | /projects | /tasks | /tasks/:taskId/comments
 *                                    bearer, forwarded as-is
 *
 * Notes:
 * - authGate runs before any body or param validation.
 * - Write bodies must arrive as application/json and parse to an object.
 * - Writes relay the upstream status; errors are thrown and rendered by
 *   errorProblemJson().
 */

import type { Request, Router } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/http/asyncHandler";
import { BadRequest } from "@shared/problem/problem";
import { parseOrThrow } from "@shared/validation/validate";
import { zIntParam } from "@shared/validation/params";
import { authGate, callerOf } from "../middleware/authGate";
import { callContext } from "../http/callContext";
import type { Aggregator } from "../services/Aggregator";
import type { ProxyForwarder } from "../services/ProxyForwarder";
import type { ServiceName } from "../registry/ServiceRegistry";

export const WriteBody = z.record(z.string(), z.unknown());

export const TaskIdParams = z.object({ taskId: zIntParam });

type WriteRoute = {
  path: string;
  service: ServiceName;
  /** Upstream path for this request; defaults to `path`. */
  target?: (req: Request) => string;
};

const WRITE_ROUTES: readonly WriteRoute[] = [
  { path: "/users", service: "users" },
  { path: "/projects", service: "projects" },
  { path: "/tasks", service: "tasks" },
  {
    path: "/tasks/:taskId/comments",
    service: "comments",
    target: (req) => {
      const { taskId } = parseOrThrow(TaskIdParams, req.params, "path params");
      return `/tasks/${taskId}/comments`;
    },
  },
];

export function mountGatewayRoutes(
  r: Router,
  deps: { aggregator: Aggregator; forwarder: ProxyForwarder }
): void {
  const { aggregator, forwarder } = deps;

  r.get(
    "/health",
    asyncHandler(async (req, res) => {
      res.status(200).json(await aggregator.health(callContext(req, res)));
    })
  );

  r.get(
    "/summary",
    authGate(),
    asyncHandler(async (req, res) => {
      res.status(200).json(await aggregator.summary(callerOf(req), callContext(req, res)));
    })
  );

  r.get(
    "/me",
    authGate(),
    asyncHandler(async (req, res) => {
      res.status(200).json(await aggregator.profile(callerOf(req), callContext(req, res)));
    })
  );

  for (const route of WRITE_ROUTES) {
    r.post(
      route.path,
      authGate(),
      asyncHandler(async (req, res) => {
        const target = route.target ? route.target(req) : route.path;
        // Without a JSON body the parser leaves req.body as {}.
        if (!req.is("application/json")) {
          throw new BadRequest("Invalid body", [
            { path: "", message: "Expected an application/json body" },
          ]);
        }
        const body = parseOrThrow(WriteBody, req.body);
        const out = await forwarder.forward(route.service, target, body, callContext(req, res));
        res.status(out.status).json(out.data);
      })
    );
  }
}
