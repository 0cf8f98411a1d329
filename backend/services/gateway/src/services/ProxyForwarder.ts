// backend/services/gateway/src/services/ProxyForwarder.ts
/**
 * Purpose:
 * - Authenticated write pass-through: POST the caller's JSON body to one
 *   backend path and hand back what it answered.
 *
 * Contract:
 * - 2xx → { status, data } (the upstream status is relayed, 201 stays 201).
 * - non-2xx → UpstreamError carrying the origin status and body text.
 * - transport failure → BadGateway "Error calling <url>: <reason>".
 * - No retries; a write is never replayed.
 */

import { BadGateway, UpstreamError } from "@shared/problem/problem";
import type { CallOptions, IOutboundWriter } from "../clients/OutboundClient";
import type { ServiceName, ServiceRegistry } from "../registry/ServiceRegistry";

export type Forwarded = { status: number; data: unknown };

export class ProxyForwarder {
  private readonly registry: ServiceRegistry;
  private readonly client: IOutboundWriter;

  constructor(opts: { registry: ServiceRegistry; client: IOutboundWriter }) {
    this.registry = opts.registry;
    this.client = opts.client;
  }

  public async forward(
    service: ServiceName,
    path: string,
    body: unknown,
    opts?: CallOptions
  ): Promise<Forwarded> {
    const result = await this.client.post(this.registry.urlFor(service, path), body, opts);
    if (result.ok) return { status: result.status, data: result.data };

    const { kind, status, detail } = result.error;
    if (kind === "transport") throw new BadGateway(detail);
    throw new UpstreamError(status, detail);
  }
}
