import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      LOGPARSE_LOG_FORMAT: "hidden",
    },
  },
});
