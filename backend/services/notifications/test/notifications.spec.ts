// backend/services/notifications/test/notifications.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { createLogger } from "@shared/logger/logger";
import { createNotificationsApp } from "../src/app";

describe("notifications service", () => {
  it("starts with an empty log", async () => {
    const app = createNotificationsApp({ log: createLogger("silent") });
    const r = await request(app).get("/notifications").expect(200);
    expect(r.body).toEqual([]);
  });

  it("POST /notify → { status: 'sent' } and records the message", async () => {
    const app = createNotificationsApp({ log: createLogger("silent") });
    const r = await request(app)
      .post("/notify")
      .send({ user_id: 3, message: "You have been assigned a task: Demo" })
      .expect(200);
    expect(r.body).toEqual({ status: "sent" });

    const list = await request(app).get("/notifications").expect(200);
    expect(list.body).toEqual([{ user_id: 3, message: "You have been assigned a task: Demo" }]);
  });

  it("POST /notify with a string user_id → 400", async () => {
    const app = createNotificationsApp({ log: createLogger("silent") });
    await request(app).post("/notify").send({ user_id: "3", message: "x" }).expect(400);
  });
});
