// backend/services/gateway/src/app.ts
/**
 * Purpose:
 * - Build the gateway Express app (no listen). Entrypoint and tests share it.
 *
 * Notes:
 * - The gateway owns /health (aggregate), so the shared liveness router is
 *   switched off.
 * - Both halves of the outbound client can be swapped independently in tests.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import { SERVICE_NAME } from "./config";
import {
  OutboundClient,
  type IOutboundReader,
  type IOutboundWriter,
} from "./clients/OutboundClient";
import type { ServiceRegistry } from "./registry/ServiceRegistry";
import { Aggregator } from "./services/Aggregator";
import { ProxyForwarder } from "./services/ProxyForwarder";
import { mountGatewayRoutes } from "./routes/gateway.routes";

export type CreateGatewayAppOptions = {
  registry: ServiceRegistry;
  log: Logger;
  /** Per-call timeout for the default OutboundClient. */
  outboundTimeoutMs?: number;
  reader?: IOutboundReader;
  writer?: IOutboundWriter;
};

export function createGatewayApp(opts: CreateGatewayAppOptions): Express {
  const { registry, log } = opts;

  const client = new OutboundClient({ timeoutMs: opts.outboundTimeoutMs ?? 2000, log });
  const reader = opts.reader ?? client;
  const writer = opts.writer ?? client;

  const aggregator = new Aggregator({ registry, client: reader, log });
  const forwarder = new ProxyForwarder({ registry, client: writer });

  return createServiceApp({
    serviceName: SERVICE_NAME,
    log,
    health: false,
    mountRoutes: (r) => mountGatewayRoutes(r, { aggregator, forwarder }),
  });
}
