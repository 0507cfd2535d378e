import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["index.test.ts", "src/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
