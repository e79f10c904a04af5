import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/server/src/**/*.test.ts", "packages/shared/src/**/*.test.ts"],
    env: { APP_ENV: "test", WANDB_API_KEY: "" },
    testTimeout: 15000,
  },
});
