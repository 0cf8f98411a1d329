// backend/services/gateway/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { ConfigError } from "@shared/problem/problem";
import { DEFAULT_SERVICE_URLS, loadGatewayConfig, serviceUrlEnvKey } from "../src/config";
import { ServiceRegistry } from "../src/registry/ServiceRegistry";

describe("loadGatewayConfig", () => {
  it("falls back to the localhost defaults", () => {
    const cfg = loadGatewayConfig({});
    expect(cfg.port).toBe(8000);
    expect(cfg.outboundTimeoutMs).toBe(2000);
    expect(cfg.registry.resolve("auth")).toBe("http://localhost:8001");
    expect(cfg.registry.resolve("notifications")).toBe("http://localhost:8006");
  });

  it("lets <NAME>_SERVICE_URL override one entry", () => {
    const cfg = loadGatewayConfig({ USERS_SERVICE_URL: "http://users:8002/" });
    expect(cfg.registry.resolve("users")).toBe("http://users:8002");
    expect(cfg.registry.resolve("tasks")).toBe(DEFAULT_SERVICE_URLS.tasks);
  });

  it("reads port and timeout", () => {
    const cfg = loadGatewayConfig({ GATEWAY_PORT: "9100", OUTBOUND_TIMEOUT_MS: "750" });
    expect(cfg.port).toBe(9100);
    expect(cfg.outboundTimeoutMs).toBe(750);
  });

  it("fails the boot on a malformed address", () => {
    expect(() => loadGatewayConfig({ TASKS_SERVICE_URL: "not a url" })).toThrow(ConfigError);
    expect(() => loadGatewayConfig({ TASKS_SERVICE_URL: "ftp://tasks" })).toThrow(
      /invalid_service_url_protocol/
    );
  });

  it("names env keys after the service", () => {
    expect(serviceUrlEnvKey("notifications")).toBe("NOTIFICATIONS_SERVICE_URL");
  });
});

describe("ServiceRegistry", () => {
  const reg = new ServiceRegistry({ ...DEFAULT_SERVICE_URLS, comments: "http://c:1//" });

  it("builds urls from base and path", () => {
    expect(reg.urlFor("comments", "/tasks/5/comments")).toBe("http://c:1/tasks/5/comments");
    expect(reg.urlFor("users", "users")).toBe("http://localhost:8002/users");
  });

  it("lists entries in declaration order", () => {
    expect(reg.entries().map(([n]) => n)).toEqual([
      "auth",
      "users",
      "projects",
      "tasks",
      "comments",
      "notifications",
    ]);
  });

  it("rejects a blank address", () => {
    expect(() => new ServiceRegistry({ ...DEFAULT_SERVICE_URLS, auth: " " })).toThrow(
      /missing_service_url/
    );
  });
});
