import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    env: {
      CLOCK_LOG_LEVEL: "error",
      CLOCK_DEFAULT_METRICS: "0",
    },
  },
});
