// backend/services/shared/src/logger/logger.ts
/**
 * Purpose:
 * - Single shared pino root logger for all services, with contextual bind().
 *     const log = bindLog({ service: "gateway", component: "aggregator" });
 *     log.info({ name }, "upstream ok");
 *
 * Runtime Controls:
 * - LOG_LEVEL = fatal | error | warn | info | debug | trace | silent (default info)
 *
 * Notes:
 * - stdout only; shipping logs elsewhere is the platform's job.
 * - Credentials never reach the log: auth/cookie headers are removed.
 */

import pino, { type Logger, type LevelWithSilent } from "pino";
import { enumEnv } from "../env/env";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function createLogger(level?: LevelWithSilent): Logger {
  return pino({
    level: level ?? enumEnv("LOG_LEVEL", LEVELS, "info"),
    redact: {
      remove: true,
      paths: [
        "req.headers.authorization",
        "req.headers.cookie",
        "headers.authorization",
        "body.password",
      ],
    },
  });
}

export const logger: Logger = createLogger();

/** Child logger carrying fixed context (service, component, route…). */
export function bindLog(ctx: Record<string, unknown>, base: Logger = logger): Logger {
  return base.child(ctx);
}

export function serializeError(err: unknown): {
  name?: string;
  message: string;
  stack?: string;
} {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: String(err.stack || "")
        .split("\n")
        .slice(0, 8)
        .join("\n"),
    };
  }
  return { message: String(err) };
}
