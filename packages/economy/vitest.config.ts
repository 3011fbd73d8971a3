import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "economy",
    // fast-check runs open a fresh SQLite database per case
    testTimeout: 30_000,
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
