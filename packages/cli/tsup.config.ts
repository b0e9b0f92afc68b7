import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  clean: true,
  sourcemap: true,
  external: ["tree-sitter", "tree-sitter-typescript", "tree-sitter-javascript"],
});
