// backend/services/gateway/src/auth/credential.ts
/**
 * Purpose:
 * - Turn a raw Authorization header into a caller identity.
 *
 * Contract:
 *   Authorization: Bearer token_for_<username>
 *
 * Notes:
 * - Structural check only: no signature, no expiry, no revocation. The
 *   auth service issues exactly this shape.
 * - Pure and synchronous; every rejection is Unauthenticated (401 + Bearer challenge).
 */

import { Unauthenticated } from "@shared/problem/problem";

export const TOKEN_PREFIX = "token_for_";

/** Username carried by a validated credential. */
export type CallerIdentity = string;

export function parseBearerIdentity(header: string | undefined): CallerIdentity {
  const raw = (header ?? "").trim();
  const space = raw.search(/\s/);
  const scheme = space < 0 ? raw : raw.slice(0, space);
  const token = space < 0 ? "" : raw.slice(space).trim();

  if (!raw || scheme.toLowerCase() !== "bearer" || !token) {
    throw new Unauthenticated("Not authenticated");
  }

  if (!token.startsWith(TOKEN_PREFIX)) {
    throw new Unauthenticated("Invalid token format");
  }

  const username = token.slice(TOKEN_PREFIX.length);
  if (!username) {
    throw new Unauthenticated("Invalid token (empty username)");
  }

  return username;
}
