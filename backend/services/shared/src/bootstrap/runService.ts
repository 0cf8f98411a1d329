// backend/services/shared/src/bootstrap/runService.ts
/**
 * Purpose:
 * - Common entrypoint for the entity services:
 *     .env → logger → app factory → listen (with signal handling)
 * - Any boot failure (bad env, port in use) is fatal: log to stderr, exit 1.
 */

import type { Express } from "express";
import { loadEnvFile, numberEnv } from "../env/env";
import { bindLog, createLogger, serializeError, type Logger } from "../logger/logger";
import { startHttpService } from "./startHttpService";

export type RunServiceOptions = {
  serviceName: string;
  /** e.g. "USERS_PORT". */
  portEnv: string;
  defaultPort: number;
  createApp: (log: Logger) => Express;
};

export function runService(opts: RunServiceOptions): void {
  const boot = async () => {
    loadEnvFile();
    const log = bindLog({ service: opts.serviceName }, createLogger());
    const port = numberEnv(opts.portEnv, opts.defaultPort);

    await startHttpService({
      app: opts.createApp(log),
      port,
      serviceName: opts.serviceName,
      logger: log,
      handleSignals: true,
    });
  };

  boot().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`[${opts.serviceName}] fatal during boot:`, serializeError(err));
    process.exit(1);
  });
}
