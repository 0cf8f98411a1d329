// backend/services/users/test/users.spec.ts
import request from "supertest";
import { beforeEach, describe, it, expect } from "vitest";
import type { Express } from "express";
import { createLogger } from "@shared/logger/logger";
import { createUsersApp } from "../src/app";

const log = createLogger("silent");
let app: Express;

beforeEach(() => {
  app = createUsersApp({ log });
});

describe("users service", () => {
  it("lists the seeded users", async () => {
    const r = await request(app).get("/users").expect(200);
    expect(r.body).toEqual([
      { id: 1, username: "alice", email: "alice@example.com" },
      { id: 2, username: "bob", email: "bob@example.com" },
    ]);
  });

  it("GET /users/:id → 404 'User not found'", async () => {
    const r = await request(app).get("/users/99").expect(404);
    expect(r.body.detail).toBe("User not found");
  });

  it("GET /users/:id rejects a non-numeric id", async () => {
    const r = await request(app).get("/users/abc").expect(400);
    expect(r.body.detail).toBe("Invalid path params");
  });

  it("POST /users → 201 with the next id", async () => {
    const r = await request(app)
      .post("/users")
      .send({ username: "carol", email: "carol@example.com" })
      .expect(201);
    expect(r.body).toEqual({ id: 3, username: "carol", email: "carol@example.com" });
    await request(app).get("/users/3").expect(200);
  });

  it("rejects a duplicate username or email", async () => {
    const r = await request(app)
      .post("/users")
      .send({ username: "someone", email: "alice@example.com" })
      .expect(400);
    expect(r.body.detail).toBe("User with same username or email already exists");
  });

  it("rejects a malformed email", async () => {
    const r = await request(app)
      .post("/users")
      .send({ username: "dave", email: "not-an-email" })
      .expect(400);
    expect(r.body.code).toBe("VALIDATION_ERROR");
  });

  it("keeps state per app instance", async () => {
    await request(app)
      .post("/users")
      .send({ username: "carol", email: "carol@example.com" })
      .expect(201);
    const other = createUsersApp({ log });
    const r = await request(other).get("/users").expect(200);
    expect(r.body).toHaveLength(2);
  });
});
