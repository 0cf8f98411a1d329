// backend/services/tasks/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createTasksApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "TASKS_PORT",
  defaultPort: 8004,
  createApp: (log) => createTasksApp({ log }),
});
