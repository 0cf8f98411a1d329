// backend/services/shared/src/problem/problemJson.ts
/**
 * References:
 * - RFC 7807: Problem Details for HTTP APIs (application/problem+json)
 *
 * Purpose:
 * - Express-only final error funnel shared by every service:
 *   1) a 404 tail handler with the problem envelope
 *   2) a global error handler that maps HttpError subclasses 1:1 and turns
 *      anything else into a sanitized 500 (stack to logs only).
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express";
import type { Logger } from "../logger/logger";
import { serializeError } from "../logger/logger";
import { HttpError, type ProblemJson } from "./problem";

function instanceOf(req: Request): string | undefined {
  return req.id === undefined ? undefined : String(req.id);
}

export function sendProblem(res: Response, problem: ProblemJson): void {
  res.status(problem.status).type("application/problem+json").json(problem);
}

export function notFoundProblemJson(): RequestHandler {
  return (req, res) => {
    sendProblem(res, {
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      instance: instanceOf(req),
    });
  };
}

function isBodyParserError(err: unknown): err is { type: string; status: number } {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function errorProblemJson(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (res.headersSent) {
      log.debug({ err: serializeError(err), url: req.originalUrl }, "error after headers sent");
      return;
    }

    if (err instanceof HttpError) {
      if (err.status >= 500) {
        log.warn(
          { status: err.status, code: err.code, url: req.originalUrl, detail: err.message },
          "request failed"
        );
      }
      res.set(err.headers);
      sendProblem(res, err.toProblem(instanceOf(req)));
      return;
    }

    if (isBodyParserError(err)) {
      sendProblem(res, {
        type: "about:blank",
        title: "Bad Request",
        status: 400,
        code: "INVALID_JSON",
        detail: "Request body is not valid JSON",
        instance: instanceOf(req),
      });
      return;
    }

    log.error(
      { err: serializeError(err), method: req.method, url: req.originalUrl },
      "unhandled error"
    );
    sendProblem(res, {
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Unexpected error",
      instance: instanceOf(req),
    });
  };
}
