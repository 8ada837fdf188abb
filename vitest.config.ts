import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // Global test setup
    globals: true,

    // Setup files - run before all tests
    setupFiles: ["./tests/setup.ts"],

    include: ["tests/**/*.test.ts"],

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html", "lcov"],
      exclude: [
        "node_modules/**",
        "dist/**",
        "tests/**",
        "examples/**",
        "**/*.test.ts",
        "**/types/**",
        "vitest.config.ts",
        "src/**/index.ts",
      ],
      include: ["src/**/*.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Retry failed tests
    retry: 0,

    // Mock options
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
