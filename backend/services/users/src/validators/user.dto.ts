// backend/services/users/src/validators/user.dto.ts
import { z } from "zod";

export const userDto = z.object({
  id: z.number().int().nonnegative(),
  username: z.string(),
  email: z.string().email(),
});

export const createUserDto = userDto.omit({ id: true });

export type User = z.infer<typeof userDto>;
export type UserCreate = z.infer<typeof createUserDto>;
