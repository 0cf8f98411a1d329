// backend/services/gateway/src/registry/ServiceRegistry.ts
/**
 * Purpose:
 * - Static name → base URL table for every backend the gateway talks to.
 *
 * Invariants:
 * - Built once at boot; frozen afterwards (process-wide read-only state).
 * - Total over ServiceName: a missing or malformed address is a ConfigError
 *   at construction, never a runtime failure.
 */

import { ConfigError } from "@shared/problem/problem";

export const SERVICE_NAMES = [
  "auth",
  "users",
  "projects",
  "tasks",
  "comments",
  "notifications",
] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export type ServiceAddresses = Record<ServiceName, string>;

function normalizeBase(name: ServiceName, raw: string | undefined): string {
  if (typeof raw !== "string" || !raw.trim()) {
    throw new ConfigError("missing_service_url", { service: name });
  }
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ConfigError("invalid_service_url", { service: name, value: raw });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError("invalid_service_url_protocol", {
      service: name,
      value: raw,
    });
  }
  return raw.trim().replace(/\/+$/, "");
}

export class ServiceRegistry {
  private readonly table: Readonly<ServiceAddresses>;

  constructor(addresses: ServiceAddresses) {
    const base = (name: ServiceName) => normalizeBase(name, addresses[name]);
    this.table = Object.freeze({
      auth: base("auth"),
      users: base("users"),
      projects: base("projects"),
      tasks: base("tasks"),
      comments: base("comments"),
      notifications: base("notifications"),
    });
  }

  public resolve(name: ServiceName): string {
    return this.table[name];
  }

  /** `<base><path>`; path must start with "/". */
  public urlFor(name: ServiceName, path: string): string {
    return `${this.table[name]}${path.startsWith("/") ? path : `/${path}`}`;
  }

  /** Entries in declaration order. */
  public entries(): Array<[ServiceName, string]> {
    return SERVICE_NAMES.map((n) => [n, this.table[n]]);
  }
}
