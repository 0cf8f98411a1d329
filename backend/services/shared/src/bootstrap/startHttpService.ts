// backend/services/shared/src/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../logger/logger";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 in tests for ephemeral port
  serviceName: string;
  logger: Logger;
  /** Install SIGINT/SIGTERM handlers (entrypoints only). */
  handleSignals?: boolean;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

/** Listen, resolve once bound, and wire graceful shutdown. */
export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const stop = () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
        server.closeAllConnections();
      });

    server.once("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      reject(err);
    });

    server.once("listening", () => {
      const addr: AddressInfo | string | null = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      if (opts.handleSignals) {
        const shutdown = (signal: NodeJS.Signals) => {
          logger.info({ signal, service: serviceName }, "shutting down service");
          stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err, service: serviceName }, "shutdown failed");
              process.exit(1);
            }
          );
        };
        process.once("SIGTERM", () => shutdown("SIGTERM"));
        process.once("SIGINT", () => shutdown("SIGINT"));
      }

      resolve({ server, boundPort, stop });
    });
  });
}
