import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/test/**/*.test.ts", "tools/test/**/*.test.ts"],
    testTimeout: 30000,
  },
});
