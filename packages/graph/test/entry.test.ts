import { describe, it, expect } from "vitest";
import { defaultConfig, type DeadwoodConfig } from "../src/config/schema.js";
import { EntryPointResolver } from "../src/entry/EntryPointResolver.js";
import {
  declaredDependencies,
  manifestEntries,
  sourceCandidates,
  workspacePackages,
  type ManifestInfo,
} from "../src/entry/manifest.js";
import { expressProvider, nextjsProvider, reactProvider } from "../src/frameworks/builtin.js";
import { selectProviders } from "../src/frameworks/registry.js";
import type { SymbolShape } from "../src/frameworks/types.js";
import { ExportResolver } from "../src/resolution/ExportResolver.js";
import { ModuleResolver } from "../src/resolution/ModuleResolver.js";
import { buildTable, type Files } from "./project.js";

async function resolveEntries(files: Files, entry: Partial<DeadwoodConfig["entry"]>) {
  const table = await buildTable(files);
  const modules = new ModuleResolver(table.unitPaths());
  const exports = new ExportResolver(table, modules, 10);
  return new EntryPointResolver(table, modules, exports, { ...defaultConfig().entry, ...entry }).resolve();
}

describe("manifest", () => {
  const cli: ManifestInfo = {
    dir: "packages/cli",
    manifest: {
      name: "@demo/cli",
      bin: { tool: "./dist/cli.js" },
      exports: { ".": { import: "./dist/index.mjs", types: "./dist/index.d.ts" }, "./*": "./dist/*.js" },
      dependencies: { commander: "^12.0.0" },
      devDependencies: { vitest: "^3.0.0" },
    },
  };

  it("lists bin and every concrete exports target", () => {
    expect(manifestEntries(cli)).toEqual([
      { field: "bin", path: "packages/cli/dist/cli.js" },
      { field: "exports", path: "packages/cli/dist/index.mjs" },
      { field: "exports", path: "packages/cli/dist/index.d.ts" },
    ]);
  });

  it("maps build output directories back to src", () => {
    expect(sourceCandidates("packages/cli/dist/cli.js")).toEqual([
      "packages/cli/dist/cli.js",
      "packages/cli/src/cli.js",
    ]);
    expect(sourceCandidates("./index.js")).toEqual(["index.js"]);
  });

  it("collects dependencies of every kind", () => {
    expect([...declaredDependencies([cli])].sort()).toEqual(["commander", "vitest"]);
  });

  it("describes workspace packages by their source entry files", () => {
    const units = new Set(["packages/cli/src/index.mts"]);
    const packages = workspacePackages([cli], (candidate) =>
      units.has(candidate.replace(/\.mjs$/, ".mts")) ? candidate.replace(/\.mjs$/, ".mts") : undefined
    );

    expect(packages).toEqual([
      { name: "@demo/cli", dir: "packages/cli", entryFiles: ["packages/cli/src/index.mts"] },
    ]);
  });
});

describe("EntryPointResolver", () => {
  it("roots the module and every export of an explicit entry file", async () => {
    const result = await resolveEntries(
      {
        "src/cli.ts": ["export function run(): void {}", "export const version = 1;"],
        "src/other.ts": "export function idle(): void {}\n",
      },
      { files: ["./src/cli.ts"] }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect([...result.value.roots]).toEqual([
        ["src/cli.ts#<module>", "explicit-file"],
        ["src/cli.ts#run", "explicit-file"],
        ["src/cli.ts#version", "explicit-file"],
      ]);
    }
  });

  it("matches entry patterns", async () => {
    const result = await resolveEntries(
      { "scripts/seed.ts": "", "scripts/migrate.ts": "", "src/lib.ts": "" },
      { patterns: ["scripts/**"] }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect([...result.value.entryUnits.keys()].sort()).toEqual(["scripts/migrate.ts", "scripts/seed.ts"]);
    }
  });

  it("treats test files as entries", async () => {
    const result = await resolveEntries({ "src/lib.ts": "", "src/lib.test.ts": "" }, {});

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.entryUnits.get("src/lib.test.ts")).toBe("test-file");
  });

  it("roots configured export names wherever they are exported", async () => {
    const result = await resolveEntries(
      {
        "src/index.ts": "",
        "src/plugin.ts": ["export function activate(): void {}", "export function helper(): void {}"],
      },
      { exports: ["activate"] }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.roots.get("src/plugin.ts#activate")).toBe("configured-export");
      expect(result.value.roots.has("src/plugin.ts#helper")).toBe(false);
    }
  });

  it("fails when auto-detection is off and nothing is configured", async () => {
    const result = await resolveEntries({ "src/index.ts": "" }, { autoDetect: false });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.remediation).toContain("entry.files");
    }
  });

  it("warns about a configured entry file that does not exist", async () => {
    const result = await resolveEntries(
      { "src/index.ts": "", "src/main.ts": "" },
      { files: ["src/gone.ts", "src/main.ts"] }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.warnings).toEqual([
        { unitPath: "src/gone.ts", code: "config-warning", message: "Configured entry file not found: src/gone.ts" },
      ]);
      expect([...result.value.entryUnits.keys()]).toEqual(["src/main.ts"]);
    }
  });
});

describe("framework providers", () => {
  const shape = (overrides: Partial<SymbolShape>): SymbolShape => ({
    name: "handler",
    kind: "function",
    unitPath: "src/handler.ts",
    exported: true,
    defaultExport: false,
    decorators: [],
    ...overrides,
  });

  it("selects providers by dependency unless configured otherwise", () => {
    const plugins = defaultConfig().plugins;

    expect(selectProviders(plugins, new Set(["react"])).providers.map((p) => p.name)).toEqual(["react"]);
    expect(
      selectProviders({ ...plugins, disabled: ["react"], enabled: ["express"] }, new Set(["react"])).providers.map(
        (p) => p.name
      )
    ).toEqual(["express"]);
    expect(selectProviders({ ...plugins, enabled: ["angular"] }, new Set()).unknown).toEqual(["angular"]);
  });

  it("recognizes Next.js pages and route handlers", () => {
    expect(nextjsProvider.match(shape({ unitPath: "app/about/page.tsx", defaultExport: true })).matched).toBe(true);
    expect(nextjsProvider.match(shape({ unitPath: "app/api/route.ts", name: "GET" }))).toEqual({
      matched: true,
      label: "Next.js GET route handler",
    });
    expect(nextjsProvider.match(shape({ unitPath: "src/util.ts", defaultExport: true })).matched).toBe(false);
  });

  it("recognizes React lifecycle methods only on classes", () => {
    expect(reactProvider.match(shape({ name: "render", kind: "method", ownerName: "View" })).matched).toBe(true);
    expect(reactProvider.match(shape({ name: "render" })).matched).toBe(false);
  });

  it("recognizes Express route modules", () => {
    expect(expressProvider.match(shape({ unitPath: "src/routes/users.ts" }))).toEqual({
      matched: true,
      label: "Express route or middleware module",
    });
  });
});
