import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    root: "./",
    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["dist/**/*", "node_modules/**/*"],
    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "lcov", "html", "json"],
      include: ["src/**/*.ts"],
      exclude: [
        "dist",
        "**/*.d.ts",
        "**/node_modules/**",
        "**/vitest.config.ts",
        "**/*.test.ts",
        "**/__tests__/**",
        "src/main.ts", // Entry point, not core logic
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
    testTimeout: 10000, // in-process HTTP tests open real sockets
    hookTimeout: 10000,
  },
});
