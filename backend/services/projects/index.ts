// backend/services/projects/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createProjectsApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "PROJECTS_PORT",
  defaultPort: 8003,
  createApp: (log) => createProjectsApp({ log }),
});
