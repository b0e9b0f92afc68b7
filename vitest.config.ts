import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/core", "packages/syntax", "packages/graph", "packages/cli"],
  },
});
