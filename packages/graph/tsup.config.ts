import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  external: ["tree-sitter", "tree-sitter-typescript", "tree-sitter-javascript", "typescript"],
});
