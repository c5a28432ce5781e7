import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["autopilot-server/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
  },
});
