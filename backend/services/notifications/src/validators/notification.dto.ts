// backend/services/notifications/src/validators/notification.dto.ts
import { z } from "zod";

export const notificationDto = z.object({
  user_id: z.number().int(),
  message: z.string(),
});

export type Notification = z.infer<typeof notificationDto>;
