// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/services/*/test/**/*.spec.ts"],
    setupFiles: ["backend/services/shared/test/setup.ts"],
    hookTimeout: 15000,
    testTimeout: 15000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
  resolve: {
    alias: {
      // e.g. import { logger } from "@shared/logger/logger"
      "@shared": path.resolve(process.cwd(), "backend/services/shared/src"),
    },
  },
});
