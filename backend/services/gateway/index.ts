// backend/services/gateway/index.ts
/**
 * Gateway entry: load env, build config (fatal on bad addresses), listen.
 */

import { loadEnvFile } from "@shared/env/env";
import { bindLog, createLogger, serializeError } from "@shared/logger/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { createGatewayApp } from "./src/app";
import { SERVICE_NAME, loadGatewayConfig } from "./src/config";

async function main(): Promise<void> {
  loadEnvFile();
  const log = bindLog({ service: SERVICE_NAME }, createLogger());

  const cfg = loadGatewayConfig();
  log.info(
    {
      port: cfg.port,
      outboundTimeoutMs: cfg.outboundTimeoutMs,
      services: Object.fromEntries(cfg.registry.entries()),
    },
    "gateway config loaded"
  );

  const app = createGatewayApp({
    registry: cfg.registry,
    log,
    outboundTimeoutMs: cfg.outboundTimeoutMs,
  });

  await startHttpService({
    app,
    port: cfg.port,
    serviceName: SERVICE_NAME,
    logger: log,
    handleSignals: true,
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(`[${SERVICE_NAME}] fatal during boot:`, serializeError(err));
  process.exit(1);
});
