// backend/services/comments/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createCommentsApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "COMMENTS_PORT",
  defaultPort: 8005,
  createApp: (log) => createCommentsApp({ log }),
});
