import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      DB_PATH: ":memory:",
      LOG_FILE: "",
      LOG_LEVEL: "error",
    },
  },
});
