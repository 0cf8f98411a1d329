// backend/services/gateway/src/clients/OutboundClient.ts
/**
 * Purpose:
 * - The ONLY client the gateway uses to call backends. One axios instance
 *   with keep-alive agents; the agent pool is the single shared resource and
 *   is safe for concurrent use by construction.
 *
 * Contract:
 * - get(): uniform absence. Any failure (network, timeout, non-2xx,
 *   malformed body, abort) resolves to undefined. tryGet() keeps the typed
 *   cause for logs and tests.
 * - post(): Result. 2xx → parsed body ({ status: "ok" } if not JSON);
 *   non-2xx → ForwardError with the origin status and body text verbatim;
 *   transport failure → ForwardError 502 naming the URL.
 * - Neither method rejects. No retries. Each call owns its timeout, and it
 *   is a hard deadline on the whole exchange: a backend that trickles its
 *   body past it is cut off like one that never answers.
 */

import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { Logger } from "@shared/logger/logger";
import { asMessage } from "@shared/problem/problem";

export type GetFailureCause = "network" | "timeout" | "status" | "malformed" | "aborted";

export type GetOutcome =
  | { ok: true; data: unknown }
  | { ok: false; cause: GetFailureCause; detail: string };

export type ForwardError = {
  /** "upstream": the origin answered non-2xx; "transport": it never answered. */
  kind: "upstream" | "transport";
  status: number;
  detail: string;
};

export type PostResult =
  | { ok: true; status: number; data: unknown }
  | { ok: false; error: ForwardError };

export type CallOptions = {
  /** Abandon the call when the inbound request goes away. */
  signal?: AbortSignal;
  /** Propagated as x-request-id. */
  requestId?: string;
};

/** Read side of the client; what the Aggregator depends on. */
export interface IOutboundReader {
  get(url: string, opts?: CallOptions): Promise<unknown | undefined>;
}

/** Write side of the client; what the ProxyForwarder depends on. */
export interface IOutboundWriter {
  post(url: string, body: unknown, opts?: CallOptions): Promise<PostResult>;
}

export type OutboundClientOptions = {
  timeoutMs: number;
  log: Logger;
  http?: AxiosInstance;
};

export const EMPTY_ACK = Object.freeze({ status: "ok" });

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  if (!text.trim()) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function classify(err: unknown): GetFailureCause {
  if (axios.isCancel(err)) return "aborted";
  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") return "timeout";
    if (err.code === "ERR_CANCELED") return "aborted";
  }
  return "network";
}

/** Per-call abort: the caller's signal or the deadline, whichever fires first. */
type Deadline = {
  signal: AbortSignal;
  expired: () => boolean;
  release: () => void;
};

export function createPooledHttp(): AxiosInstance {
  return axios.create({
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
  });
}

export class OutboundClient implements IOutboundReader, IOutboundWriter {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: OutboundClientOptions) {
    this.http = opts.http ?? createPooledHttp();
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.log.child({ component: "outbound" });
  }

  private deadline(opts?: CallOptions): Deadline {
    const ctl = new AbortController();
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      ctl.abort();
    }, this.timeoutMs);

    const upstream = opts?.signal;
    const onAbort = () => ctl.abort();
    if (upstream?.aborted) ctl.abort();
    else upstream?.addEventListener("abort", onAbort, { once: true });

    return {
      signal: ctl.signal,
      expired: () => expired,
      release: () => {
        clearTimeout(timer);
        upstream?.removeEventListener("abort", onAbort);
      },
    };
  }

  private config(
    signal: AbortSignal,
    opts?: CallOptions,
    extraHeaders: Record<string, string> = {}
  ): AxiosRequestConfig<unknown> {
    return {
      timeout: this.timeoutMs,
      // Raw text in, parsed here: a malformed body must be detectable.
      responseType: "text",
      validateStatus: () => true,
      signal,
      headers: {
        accept: "application/json",
        ...(opts?.requestId ? { "x-request-id": opts.requestId } : {}),
        ...extraHeaders,
      },
    };
  }

  public async tryGet(url: string, opts?: CallOptions): Promise<GetOutcome> {
    const dl = this.deadline(opts);
    try {
      const res = await this.http.get<string>(url, this.config(dl.signal, opts));
      if (res.status < 200 || res.status >= 300) {
        return { ok: false, cause: "status", detail: `HTTP ${res.status}` };
      }
      const parsed = parseJson(String(res.data ?? ""));
      if (!parsed.ok) {
        return { ok: false, cause: "malformed", detail: "response body is not JSON" };
      }
      return { ok: true, data: parsed.value };
    } catch (err) {
      if (dl.expired()) {
        return { ok: false, cause: "timeout", detail: `timeout of ${this.timeoutMs}ms exceeded` };
      }
      return { ok: false, cause: classify(err), detail: asMessage(err) };
    } finally {
      dl.release();
    }
  }

  public async get(url: string, opts?: CallOptions): Promise<unknown | undefined> {
    const outcome = await this.tryGet(url, opts);
    if (outcome.ok) return outcome.data;
    this.log.warn(
      { url, cause: outcome.cause, detail: outcome.detail, rid: opts?.requestId },
      "outbound GET failed"
    );
    return undefined;
  }

  public async post(url: string, body: unknown, opts?: CallOptions): Promise<PostResult> {
    const dl = this.deadline(opts);
    try {
      const res = await this.http.post<string>(
        url,
        body,
        this.config(dl.signal, opts, { "content-type": "application/json" })
      );
      const text = String(res.data ?? "");

      if (res.status < 200 || res.status >= 300) {
        this.log.info({ url, status: res.status, rid: opts?.requestId }, "upstream rejected write");
        return { ok: false, error: { kind: "upstream", status: res.status, detail: text } };
      }

      const parsed = parseJson(text);
      return {
        ok: true,
        status: res.status,
        data: parsed.ok ? parsed.value : { ...EMPTY_ACK },
      };
    } catch (err) {
      const expired = dl.expired();
      const reason = expired ? `timeout of ${this.timeoutMs}ms exceeded` : asMessage(err);
      const cause = expired ? "timeout" : classify(err);
      this.log.warn({ url, cause, rid: opts?.requestId }, "outbound POST failed");
      return {
        ok: false,
        error: { kind: "transport", status: 502, detail: `Error calling ${url}: ${reason}` },
      };
    } finally {
      dl.release();
    }
  }
}
