import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    extensions: [".ts", ".js", ".json"],
  },
  test: {
    globals: true,
    environment: "node",
    testTimeout: 10000,
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    // Silences the logger for every suite
    setupFiles: ["test/setup.ts"],
  },
});
