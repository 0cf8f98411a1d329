// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC 7807).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - the HttpError taxonomy thrown by handlers and mapped by errorProblemJson()
 *
 * Invariants:
 * - No Express imports.
 * - No process.env access.
 */

export type ProblemJson = {
  type: string; // "about:blank" unless a stable URN exists
  title: string;
  status: number;

  detail?: string;
  code?: string;
  instance?: string;

  errors?: unknown[];
};

export type ErrorDetails = Record<string, unknown>;

function formatDetails(details?: ErrorDetails): string {
  if (!details) return "";
  try {
    return " :: " + JSON.stringify(details);
  } catch {
    return "";
  }
}

/**
 * Base for every error that knows its HTTP status.
 * `detail` goes over the wire as-is; `headers` are set on the response.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly title: string;
  public readonly code?: string;
  public readonly headers: Record<string, string>;
  public readonly errors?: unknown[];

  constructor(opts: {
    status: number;
    title: string;
    detail: string;
    code?: string;
    headers?: Record<string, string>;
    errors?: unknown[];
  }) {
    super(opts.detail);
    this.name = "HttpError";
    this.status = opts.status;
    this.title = opts.title;
    this.code = opts.code;
    this.headers = opts.headers ?? {};
    this.errors = opts.errors;
  }

  toProblem(instance?: string): ProblemJson {
    const p: ProblemJson = {
      type: "about:blank",
      title: this.title,
      status: this.status,
      detail: this.message,
    };
    if (this.code) p.code = this.code;
    if (this.errors) p.errors = this.errors;
    if (instance) p.instance = instance;
    return p;
  }
}

/** Missing or malformed bearer credential. Always carries the Bearer challenge. */
export class Unauthenticated extends HttpError {
  constructor(detail = "Not authenticated") {
    super({
      status: 401,
      title: "Unauthorized",
      detail,
      code: "UNAUTHENTICATED",
      headers: { "WWW-Authenticate": "Bearer" },
    });
    this.name = "Unauthenticated";
  }
}

export class NotFound extends HttpError {
  constructor(detail = "Resource not found") {
    super({ status: 404, title: "Not Found", detail, code: "NOT_FOUND" });
    this.name = "NotFound";
  }
}

export class BadRequest extends HttpError {
  constructor(detail: string, errors?: unknown[]) {
    super({
      status: 400,
      title: "Bad Request",
      detail,
      code: errors ? "VALIDATION_ERROR" : "BAD_REQUEST",
      errors,
    });
    this.name = "BadRequest";
  }
}

/** A required upstream was absent for a read that cannot degrade. */
export class ServiceUnavailable extends HttpError {
  constructor(detail: string) {
    super({
      status: 503,
      title: "Service Unavailable",
      detail,
      code: "SERVICE_UNAVAILABLE",
    });
    this.name = "ServiceUnavailable";
  }
}

/** A forwarded write answered non-2xx; status and body text are relayed verbatim. */
export class UpstreamError extends HttpError {
  constructor(status: number, detail: string) {
    super({
      status,
      title: status >= 500 ? "Upstream Error" : "Upstream Rejected",
      detail,
      code: "UPSTREAM_ERROR",
    });
    this.name = "UpstreamError";
  }
}

/** Forwarding failed at the transport level (no upstream status available). */
export class BadGateway extends HttpError {
  constructor(detail: string) {
    super({ status: 502, title: "Bad Gateway", detail, code: "BAD_GATEWAY" });
    this.name = "BadGateway";
  }
}

/** Boot-time misconfiguration. Never mapped to a response; the process exits. */
export class ConfigError extends Error {
  public readonly details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails) {
    super(message + formatDetails(details));
    this.name = "ConfigError";
    this.details = details;
  }
}

export function asMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return "unknown_error";
  }
}
