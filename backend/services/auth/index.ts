// backend/services/auth/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createAuthApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "AUTH_PORT",
  defaultPort: 8001,
  createApp: (log) => createAuthApp({ log }),
});
