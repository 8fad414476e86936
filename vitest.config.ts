// pattern: Imperative Shell
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // File patterns
    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "**/dist/**"],

    // Performance and behavior
    testTimeout: 10000,
    hookTimeout: 10000,

    // TypeScript support
    globals: false,
  },
});
