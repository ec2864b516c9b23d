import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.spec.ts",
      "packages/adapters/*/src/**/*.spec.ts",
      "example/*/src/**/*.spec.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./vitest.setup.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts", "packages/adapters/*/src/**/*.ts"],
      exclude: ["**/*.spec.ts", "**/testing/**"],
      reporter: ["text", "json", "html"],
    },
  },
});
