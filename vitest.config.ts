// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Only RELOADING_* variables from .env files reach the tests
  const env = loadEnv(mode, process.cwd(), "RELOADING_");

  return {
    test: {
      env,
      // Reload cycles parse the whole fixture file each time
      testTimeout: 30_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
