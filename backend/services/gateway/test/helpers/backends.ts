// backend/services/gateway/test/helpers/backends.ts
import express, { type Express } from "express";
import { createLogger } from "@shared/logger/logger";
import { ServiceRegistry, type ServiceAddresses } from "../../src/registry/ServiceRegistry";
import { createGatewayApp } from "../../src/app";
import { listen, type Listening } from "../../../shared/test/helpers/listen";

export { listen, type Listening };

/** Loopback port nothing listens on; connects fail fast with ECONNREFUSED. */
export const DEAD_URL = "http://127.0.0.1:1";

export const silentLog = createLogger("silent");

export function registryWith(overrides: Partial<ServiceAddresses>): ServiceRegistry {
  return new ServiceRegistry({
    auth: overrides.auth ?? DEAD_URL,
    users: overrides.users ?? DEAD_URL,
    projects: overrides.projects ?? DEAD_URL,
    tasks: overrides.tasks ?? DEAD_URL,
    comments: overrides.comments ?? DEAD_URL,
    notifications: overrides.notifications ?? DEAD_URL,
  });
}

export function gatewayFor(
  overrides: Partial<ServiceAddresses>,
  outboundTimeoutMs = 1000
): Express {
  return createGatewayApp({
    registry: registryWith(overrides),
    log: silentLog,
    outboundTimeoutMs,
  });
}

/** Bare Express stub with a JSON body parser and /health. */
export function stubApp(): Express {
  const app = express();
  app.use(express.json());
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  return app;
}

/** Answers `body` after `ms`; the timer is dropped if the caller goes away. */
export function delayed(ms: number, body: unknown): express.RequestHandler {
  return (_req, res) => {
    const t = setTimeout(() => res.json(body), ms);
    res.once("close", () => clearTimeout(t));
  };
}

export const AUTH_ALICE = "Bearer token_for_alice";
