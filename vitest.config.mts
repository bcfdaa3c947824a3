import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["mdmerge/src/**/__tests__/**/*.test.ts", "api/src/**/__tests__/**/*.test.ts"],
    testTimeout: 20000,
    env: {
      LOG_LEVEL: "error",
    },
    coverage: {
      provider: "v8",
      include: ["mdmerge/src/**/*.ts", "api/src/**/*.ts"],
      exclude: ["**/__tests__/**"],
    },
  },
});
