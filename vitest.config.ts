import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15_000,
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["backends/**/*.ts", "services/**/*.ts", "utils/**/*.ts", "config.ts"],
    },
  },
});
