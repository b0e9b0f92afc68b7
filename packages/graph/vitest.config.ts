import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "graph",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**", "test/fixtures/**"],
    environment: "node",
    testTimeout: 20000,
    globals: true,
  },
});
