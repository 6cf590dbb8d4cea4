// vitest.config.mts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Run tests in parallel by default
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
