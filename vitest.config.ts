import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    restoreMocks: true,
    env: {
      TIPSPLIT_STACKDRIVER_ENABLED: "false"
    }
  }
});
