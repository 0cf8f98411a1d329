// backend/services/comments/src/validators/comment.dto.ts
import { z } from "zod";

export const commentDto = z.object({
  id: z.number().int().nonnegative(),
  task_id: z.number().int().nonnegative(),
  author_id: z.number().int(),
  text: z.string(),
});

/** Request body; task_id comes from the path. */
export const createCommentDto = z.object({
  author_id: z.number().int(),
  text: z.string(),
});

export type Comment = z.infer<typeof commentDto>;
export type CommentCreate = Omit<Comment, "id">;
