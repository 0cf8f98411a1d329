// backend/services/gateway/src/services/Aggregator.ts
/**
 * Purpose:
 * - Cross-service reads for the gateway: aggregate health, per-caller
 *   summary, and the caller's profile.
 *
 * Invariants:
 * - Fan-outs are concurrent. Every call resolves (absence, never rejection),
 *   so one slow or dead backend costs at most its own timeout and never
 *   cancels or taints its siblings.
 * - health() and summary() encode upstream absence as data; only profile()
 *   raises (it has nothing to degrade to).
 * - Nothing is cached.
 */

import type { Logger } from "@shared/logger/logger";
import { NotFound, ServiceUnavailable } from "@shared/problem/problem";
import type { CallerIdentity } from "../auth/credential";
import type { CallOptions, IOutboundReader } from "../clients/OutboundClient";
import type { ServiceName, ServiceRegistry } from "../registry/ServiceRegistry";

export type HealthStatus = "ok" | "unavailable";

export type HealthSummary = { gateway: "ok" } & Record<ServiceName, HealthStatus>;

export const SUMMARY_RESOURCES = ["users", "projects", "tasks"] as const;
export type SummaryResource = (typeof SUMMARY_RESOURCES)[number];

export type SummaryResult = {
  current_user: CallerIdentity;
  users_count: number | null;
  projects_count: number | null;
  tasks_count: number | null;
  users_error: string | null;
  projects_error: string | null;
  tasks_error: string | null;
};

export type UserRecord = { username: string } & Record<string, unknown>;

type ResourceSlot = { count: number | null; error: string | null };

function isUserRecord(x: unknown): x is UserRecord {
  return (
    typeof x === "object" &&
    x !== null &&
    "username" in x &&
    typeof x.username === "string"
  );
}

export class Aggregator {
  private readonly registry: ServiceRegistry;
  private readonly client: IOutboundReader;
  private readonly log: Logger;

  constructor(opts: { registry: ServiceRegistry; client: IOutboundReader; log: Logger }) {
    this.registry = opts.registry;
    this.client = opts.client;
    this.log = opts.log.child({ component: "aggregator" });
  }

  public async health(opts?: CallOptions): Promise<HealthSummary> {
    const entries = this.registry.entries();
    const results = await Promise.all(
      entries.map(async ([name, base]): Promise<[ServiceName, HealthStatus]> => {
        const data = await this.client.get(`${base}/health`, opts);
        return [name, data === undefined ? "unavailable" : "ok"];
      })
    );

    const status = new Map(results);
    const of = (n: ServiceName): HealthStatus => status.get(n) ?? "unavailable";
    return {
      gateway: "ok",
      auth: of("auth"),
      users: of("users"),
      projects: of("projects"),
      tasks: of("tasks"),
      comments: of("comments"),
      notifications: of("notifications"),
    };
  }

  private async countOf(resource: SummaryResource, opts?: CallOptions): Promise<ResourceSlot> {
    const data = await this.client.get(this.registry.urlFor(resource, `/${resource}`), opts);
    if (!Array.isArray(data)) {
      if (data !== undefined) {
        this.log.warn({ resource }, "collection payload is not an array");
      }
      return { count: null, error: `${resource}_service_unavailable` };
    }
    return { count: data.length, error: null };
  }

  public async summary(caller: CallerIdentity, opts?: CallOptions): Promise<SummaryResult> {
    const [users, projects, tasks] = await Promise.all([
      this.countOf("users", opts),
      this.countOf("projects", opts),
      this.countOf("tasks", opts),
    ]);

    return {
      current_user: caller,
      users_count: users.count,
      projects_count: projects.count,
      tasks_count: tasks.count,
      users_error: users.error,
      projects_error: projects.error,
      tasks_error: tasks.error,
    };
  }

  /**
   * Linear scan of the full users collection; the users service offers no
   * by-username lookup.
   */
  public async profile(caller: CallerIdentity, opts?: CallOptions): Promise<UserRecord> {
    const data = await this.client.get(this.registry.urlFor("users", "/users"), opts);
    if (!Array.isArray(data)) {
      throw new ServiceUnavailable("Users service unavailable");
    }

    for (const entry of data) {
      if (isUserRecord(entry) && entry.username === caller) return entry;
    }

    throw new NotFound(`User '${caller}' not found in users service`);
  }
}
