// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - pino-http request logging with x-request-id correlation.
 * - The request id is propagated from common correlation headers or minted
 *   (UUIDv4), exposed as `req.id` and echoed on the response.
 */

import pinoHttp, { type HttpLogger } from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../logger/logger";

const CORRELATION_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

export function requestIdOf(req: IncomingMessage): string | undefined {
  for (const name of CORRELATION_HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v) return v;
  }
  return undefined;
}

export function makeHttpLogger(serviceName: string, logger: Logger): HttpLogger {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const id = requestIdOf(req) || randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === "/health",
    },
    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
