import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      HARVEST_LOG_LEVEL: "silent",
    },
  },
});
