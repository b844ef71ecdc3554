// pattern: Imperative Shell
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // File patterns
    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/**/src/**/*.ts"],
      exclude: [
        "node_modules",
        "dist",
        "**/*.{test,spec}.ts",
        "**/test-utils/**",
      ],
    },

    // Performance and behavior
    testTimeout: 10000,
    hookTimeout: 10000,

    // TypeScript support
    globals: false,
    typecheck: {
      checker: "tsc",
    },
  },
});
