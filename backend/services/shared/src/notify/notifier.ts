// backend/services/shared/src/notify/notifier.ts
/**
 * Purpose:
 * - Best-effort user notifications from the entity services to the
 *   notifications service (POST <base>/notify { user_id, message }).
 *
 * Behavior:
 * - notify() never throws and never blocks the caller: the POST runs
 *   detached, bounded by timeoutMs, and failures are logged at warn.
 * - Handlers call it from res "finish", i.e. after the primary response is
 *   committed.
 */

import axios, { type AxiosInstance } from "axios";
import { numberEnv, optEnv } from "../env/env";
import type { Logger } from "../logger/logger";
import { asMessage } from "../problem/problem";

export interface INotifier {
  notify(userId: number, message: string): void;
}

export type HttpNotifierOptions = {
  baseUrl: string;
  timeoutMs: number;
  log: Logger;
  http?: AxiosInstance;
};

export class HttpNotifier implements INotifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly http: AxiosInstance;

  constructor(opts: HttpNotifierOptions) {
    this.url = `${opts.baseUrl.replace(/\/+$/, "")}/notify`;
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.log.child({ component: "notifier" });
    this.http = opts.http ?? axios.create();
  }

  public notify(userId: number, message: string): void {
    void this.send(userId, message);
  }

  /** Resolves true when the notifications service accepted the message. */
  public async send(userId: number, message: string): Promise<boolean> {
    try {
      const res = await this.http.post(
        this.url,
        { user_id: userId, message },
        { timeout: this.timeoutMs, validateStatus: () => true }
      );
      if (res.status < 200 || res.status >= 300) {
        this.log.warn({ userId, status: res.status }, "notification rejected");
        return false;
      }
      this.log.info({ userId }, "notification sent");
      return true;
    } catch (err) {
      this.log.warn({ userId, err: asMessage(err) }, "notification failed");
      return false;
    }
  }
}

export const DEFAULT_NOTIFICATIONS_URL = "http://localhost:8006";

/** NOTIFICATIONS_SERVICE_URL (default :8006), NOTIFY_TIMEOUT_MS (default 2000). */
export function notifierFromEnv(
  log: Logger,
  env: Record<string, string | undefined> = process.env
): HttpNotifier {
  return new HttpNotifier({
    baseUrl: optEnv("NOTIFICATIONS_SERVICE_URL", env) ?? DEFAULT_NOTIFICATIONS_URL,
    timeoutMs: numberEnv("NOTIFY_TIMEOUT_MS", 2000, env),
    log,
  });
}
