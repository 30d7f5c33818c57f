import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["app-runner-volatility-service/src/**/*.test.ts"],
    environment: "node",
  },
});
