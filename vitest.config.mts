import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/**/test/**/*.test.ts"],
    env: {
      USE_INMEMORY_STORE: "true",
      LOG_LEVEL: "silent"
    }
  }
});
