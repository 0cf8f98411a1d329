// backend/services/users/index.ts
import { runService } from "@shared/bootstrap/runService";
import { SERVICE_NAME, createUsersApp } from "./src/app";

runService({
  serviceName: SERVICE_NAME,
  portEnv: "USERS_PORT",
  defaultPort: 8002,
  createApp: (log) => createUsersApp({ log }),
});
