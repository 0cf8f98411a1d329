// backend/services/gateway/src/config.ts
/**
 * Why:
 * - Centralize explicit env parsing for the gateway with hard assertions;
 *   a bad address or number fails the boot, not a request.
 *
 * Env:
 *   GATEWAY_PORT                default 8000
 *   OUTBOUND_TIMEOUT_MS         default 2000 (per outbound call)
 *   <NAME>_SERVICE_URL          one per ServiceName, defaults below
 */

import { numberEnv, optEnv } from "@shared/env/env";
import {
  ServiceRegistry,
  type ServiceAddresses,
  type ServiceName,
} from "./registry/ServiceRegistry";

export const SERVICE_NAME = "gateway" as const;

export const DEFAULT_SERVICE_URLS: Readonly<ServiceAddresses> = Object.freeze({
  auth: "http://localhost:8001",
  users: "http://localhost:8002",
  projects: "http://localhost:8003",
  tasks: "http://localhost:8004",
  comments: "http://localhost:8005",
  notifications: "http://localhost:8006",
});

export function serviceUrlEnvKey(name: ServiceName): string {
  return `${name.toUpperCase()}_SERVICE_URL`;
}

export type GatewayConfig = {
  port: number;
  outboundTimeoutMs: number;
  registry: ServiceRegistry;
};

type Env = Record<string, string | undefined>;

export function loadServiceAddresses(env: Env = process.env): ServiceAddresses {
  const pick = (name: ServiceName) =>
    optEnv(serviceUrlEnvKey(name), env) ?? DEFAULT_SERVICE_URLS[name];
  return {
    auth: pick("auth"),
    users: pick("users"),
    projects: pick("projects"),
    tasks: pick("tasks"),
    comments: pick("comments"),
    notifications: pick("notifications"),
  };
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  return {
    port: numberEnv("GATEWAY_PORT", 8000, env),
    outboundTimeoutMs: numberEnv("OUTBOUND_TIMEOUT_MS", 2000, env),
    registry: new ServiceRegistry(loadServiceAddresses(env)),
  };
}
