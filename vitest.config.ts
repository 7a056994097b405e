import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "variant-name",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    globals: true,
    environment: "node",
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
