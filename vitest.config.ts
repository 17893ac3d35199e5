import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["api/src/**/*.test.ts", "api/src/**/*.spec.ts"],
    exclude: ["build/**", "dist/**", "node_modules/**"],
  },
});
