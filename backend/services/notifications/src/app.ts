// backend/services/notifications/src/app.ts
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/logger/logger";
import { NotificationLog } from "./NotificationLog";
import { mountNotificationRoutes } from "./routes/notificationRoutes";

export const SERVICE_NAME = "notifications";

export function createNotificationsApp(deps: {
  log: Logger;
  store?: NotificationLog;
}): Express {
  const store = deps.store ?? new NotificationLog();
  return createServiceApp({
    serviceName: SERVICE_NAME,
    log: deps.log,
    mountRoutes: (r) => mountNotificationRoutes(r, { store, log: deps.log }),
  });
}
