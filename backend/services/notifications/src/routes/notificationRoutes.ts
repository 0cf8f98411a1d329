// backend/services/notifications/src/routes/notificationRoutes.ts
/**
 * POST /notify { user_id, message } → { status: "sent" }
 * GET  /notifications              → everything received so far
 *
 * "Delivery" is a log line.
 */

import type { Router } from "express";
import type { Logger } from "@shared/logger/logger";
import { parseOrThrow } from "@shared/validation/validate";
import type { NotificationLog } from "../NotificationLog";
import { notificationDto } from "../validators/notification.dto";

export function mountNotificationRoutes(
  r: Router,
  deps: { store: NotificationLog; log: Logger }
): void {
  const { store, log } = deps;

  r.post("/notify", (req, res) => {
    const n = parseOrThrow(notificationDto, req.body);
    log.info({ userId: n.user_id, message: n.message }, "notification delivered");
    store.append(n);
    res.status(200).json({ status: "sent" });
  });

  r.get("/notifications", (_req, res) => {
    res.json(store.list());
  });
}
