import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "cli",
    watch: false,
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
    isolate: true,
  },
});
