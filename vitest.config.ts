import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/tests/**/*.test.ts",
      "packages/server/*/tests/**/*.test.ts",
      "examples/*/tests/**/*.test.ts",
    ],
    testTimeout: 20_000,
  },
});
