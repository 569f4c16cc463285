import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.test.ts",
      "apps/*/tests/**/*.test.ts",
      "scripts/tests/**/*.test.ts",
    ],
    exclude: ["**/node_modules/**"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
  },
});
