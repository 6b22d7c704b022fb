import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Keep tests independent of a developer's .env / shell.
    env: {
      POSTGRES_DSN: "",
      MANGA_DATA_DIR: "",
      MANGA_REPORT_DIR: "",
      MANGA_KEEP_DAYS: "",
      MANGA_BATCH_SIZE: "",
      MANGA_LOG_LEVEL: "",
      MANGA_DEBUG: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70,
        perFile: false,
      },
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
