// backend/services/shared/test/setup.ts
// Runs before every spec file (vitest setupFiles): quiet, deterministic env.
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL ||= "silent";
