import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared/**/__tests__/*.test.ts", "scripts/**/__tests__/*.test.ts"],
    testTimeout: 30000,
  },
});
