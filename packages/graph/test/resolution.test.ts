import { describe, it, expect } from "vitest";
import { ExportResolver } from "../src/resolution/ExportResolver.js";
import { ModuleResolver } from "../src/resolution/ModuleResolver.js";
import { ReferenceResolver } from "../src/resolution/ReferenceResolver.js";
import { buildTable, type Files } from "./project.js";

async function resolvers(files: Files, maxDepth = 10) {
  const table = await buildTable(files);
  const modules = new ModuleResolver(table.unitPaths());
  const exports = new ExportResolver(table, modules, maxDepth);
  return { table, modules, exports, references: new ReferenceResolver(table, modules, exports) };
}

describe("ModuleResolver", () => {
  const units = [
    "src/a.ts",
    "src/b/index.ts",
    "src/c.tsx",
    "src/types.ts",
    "lib/x.mts",
    "src/app/alias.ts",
    "packages/util/src/index.ts",
    "packages/util/src/deep.ts",
  ];

  it("resolves relative specifiers through extensions and index files", () => {
    const resolver = new ModuleResolver(units);

    expect(resolver.resolve("./a.js", "src/main.ts")).toEqual({ kind: "unit", path: "src/a.ts" });
    expect(resolver.resolve("./b", "src/main.ts")).toEqual({ kind: "unit", path: "src/b/index.ts" });
    expect(resolver.resolve("./c.jsx", "src/main.ts")).toEqual({ kind: "unit", path: "src/c.tsx" });
    expect(resolver.resolve("../lib/x.mjs", "src/main.ts")).toEqual({ kind: "unit", path: "lib/x.mts" });
    expect(resolver.resolve("./missing", "src/main.ts")).toEqual({ kind: "unresolved" });
  });

  it("treats bare and node: specifiers as external", () => {
    const resolver = new ModuleResolver(units);

    expect(resolver.resolve("react", "src/main.ts")).toEqual({ kind: "external" });
    expect(resolver.resolve("node:fs", "src/main.ts")).toEqual({ kind: "external" });
  });

  it("maps declaration files to their sources", () => {
    expect(new ModuleResolver(units).findUnit("src/types.d.ts")).toBe("src/types.ts");
  });

  it("follows tsconfig paths and reports a matching alias that leads nowhere", () => {
    const resolver = new ModuleResolver(units, {
      aliases: { baseDir: "", paths: { "@app/*": ["src/app/*"] }, hasBaseUrl: false },
    });

    expect(resolver.resolve("@app/alias", "src/main.ts")).toEqual({ kind: "unit", path: "src/app/alias.ts" });
    expect(resolver.resolve("@app/nothing", "src/main.ts")).toEqual({ kind: "unresolved" });
  });

  it("resolves workspace packages and their subpaths to source", () => {
    const resolver = new ModuleResolver(units, {
      workspacePackages: [{ name: "@demo/util", dir: "packages/util", entryFiles: [] }],
    });

    expect(resolver.resolve("@demo/util", "src/main.ts")).toEqual({
      kind: "unit",
      path: "packages/util/src/index.ts",
    });
    expect(resolver.resolve("@demo/util/deep", "src/main.ts")).toEqual({
      kind: "unit",
      path: "packages/util/src/deep.ts",
    });
  });
});

describe("ExportResolver", () => {
  it("follows a renamed re-export to the original symbol", async () => {
    const { exports } = await resolvers({
      "src/index.ts": ['export { helper as renamed } from "./lib";', 'export * from "./more";'],
      "src/lib.ts": "export function helper(): void {}\n",
      "src/more.ts": ["export const extra = 1;", "export default 5;"],
    });

    expect(exports.resolve("src/index.ts", "renamed")).toEqual({
      kind: "symbols",
      ids: ["src/lib.ts#helper"],
      viaReexport: true,
    });
    expect(exports.resolve("src/index.ts", "extra")).toEqual({
      kind: "symbols",
      ids: ["src/more.ts#extra"],
      viaReexport: true,
    });
  });

  it("never forwards a default export through export *", async () => {
    const { exports } = await resolvers({
      "src/index.ts": 'export * from "./more";\n',
      "src/more.ts": ["export const extra = 1;", "export default 5;"],
    });

    expect(exports.exportedNames("src/index.ts")).toEqual(["extra"]);
    expect(exports.resolve("src/index.ts", "default")).toEqual({ kind: "unresolved", reason: "missing" });
  });

  it("terminates on cyclic re-exports", async () => {
    const { exports } = await resolvers({
      "src/a.ts": 'export { loop } from "./b";\n',
      "src/b.ts": 'export { loop } from "./a";\n',
    });

    expect(exports.resolve("src/a.ts", "loop")).toEqual({ kind: "unresolved", reason: "cycle" });
    expect(exports.resolveAll("src/a.ts")).toEqual([]);
  });

  it("stops following chains deeper than the configured bound", async () => {
    const files: Files = {
      "src/c0.ts": 'export { x } from "./c1";\n',
      "src/c1.ts": 'export { x } from "./c2";\n',
      "src/c2.ts": 'export { x } from "./c3";\n',
      "src/c3.ts": "export const x = 1;\n",
    };

    const shallow = await resolvers(files, 2);
    expect(shallow.exports.resolve("src/c0.ts", "x")).toEqual({ kind: "unresolved", reason: "depth" });

    const deep = await resolvers(files, 3);
    expect(deep.exports.resolve("src/c0.ts", "x")).toEqual({
      kind: "symbols",
      ids: ["src/c3.ts#x"],
      viaReexport: true,
    });
  });

  it("expands namespace re-exports in resolveAll", async () => {
    const { exports } = await resolvers({
      "src/index.ts": 'export * as shapes from "./shapes";\n',
      "src/shapes.ts": ["export function square(): void {}", "export function circle(): void {}"],
    });

    expect(exports.resolve("src/index.ts", "shapes")).toEqual({
      kind: "namespace",
      unitPath: "src/shapes.ts",
      viaReexport: true,
    });
    expect(exports.resolveAll("src/index.ts").sort()).toEqual(["src/shapes.ts#circle", "src/shapes.ts#square"]);
  });
});

describe("ReferenceResolver", () => {
  const geometry = [
    "export function area(r: number): number {",
    "  return r * r;",
    "}",
    "",
    "export function perimeter(r: number): number {",
    "  return 2 * r;",
    "}",
  ];

  it("resolves a namespace member access to the one export it names", async () => {
    const { table, references } = await resolvers({
      "src/main.ts": ['import * as geometry from "./geometry";', "", "console.log(geometry.area(2));"],
      "src/geometry.ts": geometry,
    });
    const unit = table.unit("src/main.ts");
    if (!unit) throw new Error("unit missing");

    const { edges } = references.resolveUnit(unit);
    expect(edges.map((edge) => [edge.from, edge.kind, edge.to])).toEqual([
      ["src/main.ts#<module>", "module-load", "src/geometry.ts#<module>"],
      ["src/main.ts#<module>", "namespace-member", "src/geometry.ts#area"],
    ]);
    expect(edges[1]?.line).toBe(3);
  });

  it("treats a namespace used as a value as using every export", async () => {
    const { table, references } = await resolvers({
      "src/main.ts": ['import * as geometry from "./geometry";', "", "export const all = geometry;"],
      "src/geometry.ts": geometry,
    });
    const unit = table.unit("src/main.ts");
    if (!unit) throw new Error("unit missing");

    const escapes = references.resolveUnit(unit).edges.filter((edge) => edge.kind === "reference");
    expect(escapes.map((edge) => edge.to)).toEqual(["src/geometry.ts#area", "src/geometry.ts#perimeter"]);
    expect(escapes.every((edge) => edge.evidence.includes("namespace-escape"))).toBe(true);
  });

  it("counts an unresolvable import once and remembers its names", async () => {
    const { table, references } = await resolvers({
      "src/main.ts": ['import { missing } from "./nowhere";', "", "missing();", "missing();"],
    });
    const unit = table.unit("src/main.ts");
    if (!unit) throw new Error("unit missing");

    const resolution = references.resolveUnit(unit);
    expect(resolution.unresolvedReferences).toBe(1);
    expect([...resolution.unresolvedNames]).toEqual(["missing"]);
    expect(resolution.edges).toEqual([]);
  });

  it("ends a call on the declaration behind a re-export", async () => {
    const { table, references } = await resolvers({
      "src/main.ts": ['import { X } from "./b";', "", "X();"],
      "src/b.ts": 'export { X } from "./a";\n',
      "src/a.ts": "export function X(): void {}\n",
    });
    const unit = table.unit("src/main.ts");
    if (!unit) throw new Error("unit missing");

    const { edges } = references.resolveUnit(unit);
    expect(edges.map((edge) => [edge.from, edge.kind, edge.to])).toEqual([
      ["src/main.ts#<module>", "module-load", "src/b.ts#<module>"],
      ["src/main.ts#<module>", "call", "src/a.ts#X"],
    ]);
    expect(edges[1]?.evidence).toEqual(["via-reexport"]);
  });

  it("falls back to every member of that name when destructuring an unknown value", async () => {
    const { table, references } = await resolvers({
      "src/box.ts": [
        "export class Box {",
        "  size(): number {",
        "    return 1;",
        "  }",
        "}",
        "",
        "export function measure(source: { size: () => number }): number {",
        "  const { size } = source;",
        "  return size();",
        "}",
      ],
    });
    const unit = table.unit("src/box.ts");
    if (!unit) throw new Error("unit missing");

    const members = references.resolveUnit(unit).edges.filter((edge) => edge.kind === "member-access");
    expect(members.map((edge) => [edge.from, edge.to, edge.evidence, edge.line])).toEqual([
      ["src/box.ts#measure", "src/box.ts#Box.size", ["receiver-unknown"], 8],
    ]);
  });

  it("flags eval as reflective access on the enclosing symbol", async () => {
    const { table, references } = await resolvers({
      "src/risky.ts": ["export function risky(code: string): unknown {", "  return eval(code);", "}"],
    });
    const unit = table.unit("src/risky.ts");
    if (!unit) throw new Error("unit missing");

    expect(references.resolveUnit(unit).evidence).toEqual([
      { symbolId: "src/risky.ts#risky", flag: "reflective-access" },
    ]);
  });

  it("records literal subscript keys", async () => {
    const { table, references } = await resolvers({
      "src/main.ts": ["const lookup: Record<string, number> = {};", 'lookup["alpha"] = 1;'],
    });
    const unit = table.unit("src/main.ts");
    if (!unit) throw new Error("unit missing");

    expect([...references.resolveUnit(unit).stringKeys]).toEqual(["alpha"]);
  });
});
