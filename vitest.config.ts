import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["gateway/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000
  }
});
