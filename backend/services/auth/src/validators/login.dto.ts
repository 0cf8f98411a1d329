// backend/services/auth/src/validators/login.dto.ts
import { z } from "zod";

export const loginDto = z.object({
  username: z.string(),
  password: z.string(),
});

export type LoginInput = z.infer<typeof loginDto>;

export type LoginResponse = {
  access_token: string;
  token_type: "bearer";
};
