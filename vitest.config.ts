import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // DuckDB-backed suites open their own in-memory databases
    testTimeout: 20000,
    env: {
      GLOBAL_LOG_LEVEL: "error",
    },
  },
});
