import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      MOODSORT_QUIET: "1",
      MOODSORT_CONFIG_PATH: "/nonexistent/moodsort/config.yaml",
    },
  },
});
