// backend/services/gateway/src/middleware/authGate.ts
/**
 * Purpose:
 * - Guard protected gateway routes: validate the bearer credential and pin
 *   the caller identity on the request for handlers.
 *
 * Notes:
 * - Rejections flow through next(err) so errorProblemJson() renders the
 *   401 problem and the WWW-Authenticate challenge.
 */

import type { Request, RequestHandler } from "express";
import { Unauthenticated } from "@shared/problem/problem";
import { parseBearerIdentity, type CallerIdentity } from "../auth/credential";

/* eslint-disable @typescript-eslint/no-namespace */
declare global {
  namespace Express {
    interface Request {
      /** Set by authGate() on protected routes. */
      caller?: CallerIdentity;
    }
  }
}
/* eslint-enable @typescript-eslint/no-namespace */

export function authGate(): RequestHandler {
  return (req, _res, next) => {
    try {
      req.caller = parseBearerIdentity(req.headers.authorization);
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** Caller pinned by authGate(); a handler mounted without the gate is a wiring bug. */
export function callerOf(req: Request): CallerIdentity {
  if (!req.caller) throw new Unauthenticated("Not authenticated");
  return req.caller;
}
