import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["client/tests/**/*.test.ts"],
    reporters: ["default"],
    // no pacing between mocked responses
    env: { RATE_MS: "0" },
  },
});
