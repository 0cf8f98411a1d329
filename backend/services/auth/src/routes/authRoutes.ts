// backend/services/auth/src/routes/authRoutes.ts
/**
 * POST /login { username, password } → { access_token, token_type }
 *
 * Demo credential issuer: any username/password pair is accepted and the
 * token is derived from the username alone ("token_for_<username>"). The
 * gateway parses that shape; nothing is signed.
 */

import type { Router } from "express";
import type { Logger } from "@shared/logger/logger";
import { parseOrThrow } from "@shared/validation/validate";
import { loginDto, type LoginResponse } from "../validators/login.dto";

export const TOKEN_PREFIX = "token_for_";

export function issueToken(username: string): LoginResponse {
  return { access_token: `${TOKEN_PREFIX}${username}`, token_type: "bearer" };
}

export function mountAuthRoutes(r: Router, log: Logger): void {
  r.post("/login", (req, res) => {
    const { username } = parseOrThrow(loginDto, req.body);
    log.info({ username }, "login");
    res.status(200).json(issueToken(username));
  });
}
