import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/**/src/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
