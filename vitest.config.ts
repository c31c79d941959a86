import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "nps-mcp-server/src/**/__tests__/**/*.test.ts",
      "shared/**/__tests__/**/*.test.ts",
    ],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    globals: true,
    env: {
      OTEL_SDK_DISABLED: "true",
      LOG_LEVEL: "error",
    },
  },
});
