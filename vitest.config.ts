import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./tests/vitest.setup.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
