import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@marketwatch/shared-utils": path.resolve(__dirname, "shared-utils/src/index.ts"),
      "@marketwatch/monitor": path.resolve(__dirname, "monitor/src/index.ts"),
    },
  },
  test: {
    include: [
      "shared-utils/tests/**/*.test.ts",
      "monitor/tests/**/*.test.ts",
      "integration-tests/src/**/*.test.ts",
    ],
    environment: "node",
    testTimeout: 10000,
  },
});
