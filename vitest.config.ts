import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts", "src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./tests/vitest.setup.ts"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "text-summary", "html"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "dist/", "coverage/", "**/*.d.ts", "tests/**"],
    },
    testTimeout: 10000,
    sequence: {
      shuffle: true,
    },
  },
});
