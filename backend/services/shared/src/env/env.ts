// backend/services/shared/src/env/env.ts
/**
 * Purpose:
 * - Explicit env parsing with hard assertions for every service.
 * - `.env` is loaded by entrypoints only (loadEnvFile); modules read
 *   process.env through these helpers so failures name the offending key.
 *
 * Invariants:
 * - Helpers throw ConfigError; callers treat it as a fatal boot error.
 */

import path from "node:path";
import dotenv from "dotenv";
import { ConfigError } from "../problem/problem";

type Env = Record<string, string | undefined>;

/** Load `.env` from cwd (or ENV_FILE). Missing file is fine; injected env wins. */
export function loadEnvFile(file = process.env.ENV_FILE || ".env"): void {
  const abs = path.resolve(process.cwd(), file);
  const parsed = dotenv.config({ path: abs });
  const err = parsed.error;
  if (err && !("code" in err && err.code === "ENOENT")) {
    throw new ConfigError(`Failed to load env file: ${abs}`, {
      cause: err.message,
    });
  }
}

export function optEnv(name: string, env: Env = process.env): string | undefined {
  const v = env[name];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

export function requireEnv(name: string, env: Env = process.env): string {
  const v = optEnv(name, env);
  if (v === undefined) throw new ConfigError(`Missing required env var: ${name}`);
  return v;
}

export function numberEnv(name: string, def: number, env: Env = process.env): number {
  const raw = optEnv(name, env);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`Env var ${name} is not a valid non-negative number`, {
      value: raw,
    });
  }
  return Math.floor(n);
}

export function enumEnv<T extends string>(
  name: string,
  allowed: readonly T[],
  def: T,
  env: Env = process.env
): T {
  const raw = optEnv(name, env);
  if (raw === undefined) return def;
  const hit = allowed.find((a) => a === raw);
  if (!hit) {
    throw new ConfigError(`Env var ${name} must be one of: ${allowed.join(", ")}`, {
      value: raw,
    });
  }
  return hit;
}
