/**
 * Import specifier -> unit path, following the rules TypeScript and Node
 * tooling use: relative paths, extension-less paths, index files, tsconfig
 * `paths` aliases and workspace package names.
 */

import path from "node:path";
import { SOURCE_EXTENSIONS } from "@deadwood/syntax";

export type ModuleTarget =
  | { kind: "unit"; path: string }
  | { kind: "external" }
  | { kind: "unresolved" };

export interface PathAliases {
  /** Root-relative directory the alias targets are relative to */
  baseDir: string;
  /** tsconfig `compilerOptions.paths` */
  paths: Record<string, string[]>;
  /** Whether `baseUrl` was set, making bare specifiers resolvable from baseDir */
  hasBaseUrl: boolean;
}

export interface WorkspacePackage {
  name: string;
  /** Root-relative package directory ("" for the root package) */
  dir: string;
  /** Root-relative source files the package's `.` entry maps to */
  entryFiles: string[];
}

export interface ModuleResolverOptions {
  aliases?: PathAliases;
  workspacePackages?: WorkspacePackage[];
}

// Compiled output extensions and the sources they come from
const SOURCE_FOR_OUTPUT: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

const UNRESOLVED: ModuleTarget = { kind: "unresolved" };
const EXTERNAL: ModuleTarget = { kind: "external" };

export class ModuleResolver {
  private readonly units: ReadonlySet<string>;
  private readonly aliasPatterns: Array<{ prefix: string; suffix: string; targets: string[] }>;
  private readonly packages: WorkspacePackage[];
  private readonly cache = new Map<string, ModuleTarget>();

  constructor(
    units: Iterable<string>,
    private readonly options: ModuleResolverOptions = {}
  ) {
    this.units = new Set(units);
    this.aliasPatterns = Object.entries(options.aliases?.paths ?? {})
      .map(([pattern, targets]) => {
        const star = pattern.indexOf("*");
        return star === -1
          ? { prefix: pattern, suffix: "", targets, exact: true }
          : { prefix: pattern.slice(0, star), suffix: pattern.slice(star + 1), targets, exact: false };
      })
      // most specific pattern first, as TypeScript does
      .sort((a, b) => b.prefix.length - a.prefix.length)
      .map(({ prefix, suffix, targets, exact }) =>
        exact ? { prefix, suffix: "\0exact", targets } : { prefix, suffix, targets }
      );
    this.packages = [...(options.workspacePackages ?? [])].sort(
      (a, b) => b.name.length - a.name.length
    );
  }

  resolve(specifier: string, fromUnit: string): ModuleTarget {
    const key = `${fromUnit}\0${specifier}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const target = this.resolveUncached(specifier, fromUnit);
    this.cache.set(key, target);
    return target;
  }

  /**
   * Map a root-relative path (possibly extension-less, or pointing at build
   * output) to a unit, if one exists.
   */
  findUnit(candidate: string): string | undefined {
    const base = normalize(candidate);
    if (this.units.has(base)) return base;

    const ext = path.posix.extname(base);
    const stem = ext ? base.slice(0, -ext.length) : base;

    const declaration = /\.d\.([mc]?)ts$/.exec(base);
    if (declaration) {
      const source = `${base.slice(0, -declaration[0].length)}.${declaration[1]}ts`;
      if (this.units.has(source)) return source;
    }

    for (const sourceExt of SOURCE_FOR_OUTPUT[ext] ?? []) {
      if (this.units.has(stem + sourceExt)) return stem + sourceExt;
    }

    for (const candidateExt of SOURCE_EXTENSIONS) {
      if (this.units.has(base + candidateExt)) return base + candidateExt;
    }
    for (const candidateExt of SOURCE_EXTENSIONS) {
      const index = path.posix.join(base, `index${candidateExt}`);
      if (this.units.has(index)) return index;
    }
    return undefined;
  }

  private resolveUncached(specifier: string, fromUnit: string): ModuleTarget {
    if (isRelative(specifier)) {
      const joined = path.posix.join(path.posix.dirname(fromUnit), specifier);
      return this.toTarget(this.findUnit(joined));
    }
    if (specifier.startsWith("/") || specifier.startsWith("node:")) {
      return EXTERNAL;
    }

    const aliased = this.resolveAlias(specifier);
    if (aliased) return aliased;

    const workspace = this.resolveWorkspacePackage(specifier);
    if (workspace) return workspace;

    const aliases = this.options.aliases;
    if (aliases?.hasBaseUrl) {
      const fromBase = this.findUnit(path.posix.join(aliases.baseDir, specifier));
      if (fromBase) return { kind: "unit", path: fromBase };
    }
    return EXTERNAL;
  }

  private resolveAlias(specifier: string): ModuleTarget | undefined {
    const baseDir = this.options.aliases?.baseDir ?? "";
    for (const { prefix, suffix, targets } of this.aliasPatterns) {
      let captured: string;
      if (suffix === "\0exact") {
        if (specifier !== prefix) continue;
        captured = "";
      } else {
        if (!specifier.startsWith(prefix) || !specifier.endsWith(suffix)) continue;
        if (specifier.length < prefix.length + suffix.length) continue;
        captured = specifier.slice(prefix.length, specifier.length - suffix.length);
      }
      for (const target of targets) {
        const found = this.findUnit(path.posix.join(baseDir, target.replace("*", captured)));
        if (found) return { kind: "unit", path: found };
      }
      // a matching alias that leads nowhere is a broken reference, not a package
      return UNRESOLVED;
    }
    return undefined;
  }

  private resolveWorkspacePackage(specifier: string): ModuleTarget | undefined {
    for (const pkg of this.packages) {
      if (specifier === pkg.name) {
        for (const entry of pkg.entryFiles) {
          if (this.units.has(entry)) return { kind: "unit", path: entry };
        }
        const fallback =
          this.findUnit(path.posix.join(pkg.dir, "src/index")) ??
          this.findUnit(path.posix.join(pkg.dir, "index"));
        return this.toTarget(fallback);
      }
      if (specifier.startsWith(`${pkg.name}/`)) {
        const subpath = specifier.slice(pkg.name.length + 1);
        const found =
          this.findUnit(path.posix.join(pkg.dir, subpath)) ??
          this.findUnit(path.posix.join(pkg.dir, "src", subpath));
        return this.toTarget(found);
      }
    }
    return undefined;
  }

  private toTarget(found: string | undefined): ModuleTarget {
    return found ? { kind: "unit", path: found } : UNRESOLVED;
  }
}

function isRelative(specifier: string): boolean {
  return (
    specifier === "." ||
    specifier === ".." ||
    specifier.startsWith("./") ||
    specifier.startsWith("../")
  );
}

function normalize(candidate: string): string {
  const normalized = path.posix.normalize(candidate.replace(/\\/g, "/"));
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}
