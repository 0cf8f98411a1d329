// backend/services/notifications/src/NotificationLog.ts
import type { Notification } from "./validators/notification.dto";

/** Append-only record of delivered notifications, owned by the app instance. */
export class NotificationLog {
  private readonly entries: Notification[] = [];

  public append(n: Notification): void {
    this.entries.push({ ...n });
  }

  public list(): Notification[] {
    return this.entries.map((n) => ({ ...n }));
  }
}
