// backend/services/notifications/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createNotificationsApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "NOTIFICATIONS_PORT",
  defaultPort: 8006,
  createApp: (log) => createNotificationsApp({ log }),
});
