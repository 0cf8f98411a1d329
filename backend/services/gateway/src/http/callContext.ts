// backend/services/gateway/src/http/callContext.ts
import type { Request, Response } from "express";
import type { CallOptions } from "../clients/OutboundClient";

/**
 * Per-request outbound options: the inbound request id, and a signal that
 * aborts when the client disconnects before the response is written.
 */
export function callContext(req: Request, res: Response): CallOptions {
  const ctl = new AbortController();
  res.once("close", () => {
    if (!res.writableFinished) ctl.abort();
  });
  return { signal: ctl.signal, requestId: String(req.id) };
}
