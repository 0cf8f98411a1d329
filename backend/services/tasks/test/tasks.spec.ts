// backend/services/tasks/test/tasks.spec.ts
import request from "supertest";
import { beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import type { Express } from "express";
import { createLogger } from "@shared/logger/logger";
import type { INotifier } from "@shared/notify/notifier";
import { createTasksApp } from "../src/app";

const log = createLogger("silent");
let app: Express;
type Notify = (userId: number, message: string) => void;
let notify: Mock<Notify>;

beforeEach(() => {
  notify = vi.fn<Notify>();
  const notifier: INotifier = { notify };
  app = createTasksApp({ log, notifier });
});

describe("tasks service – reads", () => {
  it("lists the seeded tasks", async () => {
    const r = await request(app).get("/tasks").expect(200);
    expect(r.body).toHaveLength(3);
  });

  it("GET /tasks/:id", async () => {
    const r = await request(app).get("/tasks/2").expect(200);
    expect(r.body).toMatchObject({ id: 2, project_id: 1, status: "in_progress" });
  });

  it("GET /tasks/:id → 404 'Task not found'", async () => {
    const r = await request(app).get("/tasks/77").expect(404);
    expect(r.body.detail).toBe("Task not found");
  });

  it("GET /projects/:projectId/tasks filters by project", async () => {
    const r = await request(app).get("/projects/1/tasks").expect(200);
    expect(r.body.map((t: { id: number }) => t.id)).toEqual([1, 2]);
    const none = await request(app).get("/projects/9/tasks").expect(200);
    expect(none.body).toEqual([]);
  });
});

describe("tasks service – writes", () => {
  it("POST /tasks → 201 with status todo and notifies the assignee", async () => {
    const r = await request(app)
      .post("/tasks")
      .send({ project_id: 1, title: "Write tests", assignee_id: 2 })
      .expect(201);
    expect(r.body).toEqual({
      id: 4,
      project_id: 1,
      title: "Write tests",
      description: null,
      status: "todo",
      assignee_id: 2,
    });
    await vi.waitFor(() =>
      expect(notify).toHaveBeenCalledWith(2, "You have been assigned a task: Write tests")
    );
  });

  it("POST /tasks without an assignee sends nothing", async () => {
    await request(app).post("/tasks").send({ project_id: 2, title: "Solo" }).expect(201);
    expect(notify).not.toHaveBeenCalled();
  });

  it("POST /tasks ignores a client-supplied status", async () => {
    const r = await request(app)
      .post("/tasks")
      .send({ project_id: 2, title: "Eager", status: "done" })
      .expect(201);
    expect(r.body.status).toBe("todo");
  });

  it("PATCH /tasks/:id updates given fields and ignores nulls", async () => {
    const r = await request(app)
      .patch("/tasks/2")
      .send({ status: "done", title: null })
      .expect(200);
    expect(r.body).toMatchObject({
      id: 2,
      status: "done",
      title: "Build the users service",
    });
  });

  it("PATCH /tasks/:id rejects an unknown status", async () => {
    const r = await request(app).patch("/tasks/2").send({ status: "blocked" }).expect(400);
    expect(r.body.code).toBe("VALIDATION_ERROR");
  });

  it("PATCH /tasks/:id → 404 for an unknown task", async () => {
    await request(app).patch("/tasks/50").send({ title: "x" }).expect(404);
  });

  it("DELETE /tasks/:id → 204, then 404", async () => {
    await request(app).delete("/tasks/3").expect(204);
    await request(app).get("/tasks/3").expect(404);
    await request(app).delete("/tasks/3").expect(404);
  });
});
