import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
    },
  },
});
