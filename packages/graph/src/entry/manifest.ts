/**
 * package.json reading: the root manifest and those of its npm workspaces.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";
import * as z from "zod/v4";
import { Err, Ok, toError, type Logger, type Result } from "@deadwood/core";
import type { WorkspacePackage } from "../resolution/ModuleResolver.js";

const DependencyMapSchema = z.record(z.string(), z.string());

export const ManifestSchema = z.object({
  name: z.string().optional(),
  main: z.string().optional(),
  module: z.string().optional(),
  types: z.string().optional(),
  typings: z.string().optional(),
  bin: z.union([z.string(), z.record(z.string(), z.string())]).optional(),
  exports: z.unknown().optional(),
  dependencies: DependencyMapSchema.optional(),
  devDependencies: DependencyMapSchema.optional(),
  peerDependencies: DependencyMapSchema.optional(),
  workspaces: z
    .union([z.array(z.string()), z.object({ packages: z.array(z.string()).optional() })])
    .optional(),
  deadwood: z.unknown().optional(),
});

export type PackageManifest = z.infer<typeof ManifestSchema>;

export interface ManifestInfo {
  /** Root-relative directory, "" for the root package */
  dir: string;
  manifest: PackageManifest;
}

export interface ManifestEntry {
  field: string;
  /** Root-relative path as written in the manifest, not yet mapped to source */
  path: string;
}

const OUTPUT_DIRS = new Set(["dist", "build", "lib", "out"]);

export async function readManifest(filePath: string): Promise<Result<PackageManifest, Error>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (error) {
    return Err(toError(error));
  }
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    return Err(new Error(`${filePath}: ${z.prettifyError(parsed.error)}`));
  }
  return Ok(parsed.data);
}

/**
 * The root manifest plus one per workspace package. Missing or unreadable
 * manifests are skipped.
 */
export async function loadManifests(root: string, logger: Logger): Promise<ManifestInfo[]> {
  const rootPath = path.join(root, "package.json");
  const rootManifest = await readManifest(rootPath);
  if (!rootManifest.ok) {
    if (!isMissingFile(rootManifest.error)) {
      logger.warn(`ignoring package.json: ${rootManifest.error.message}`);
    }
    return [];
  }

  const manifests: ManifestInfo[] = [{ dir: "", manifest: rootManifest.value }];
  const workspaces = rootManifest.value.workspaces;
  const patterns = Array.isArray(workspaces) ? workspaces : (workspaces?.packages ?? []);
  if (patterns.length === 0) return manifests;

  const found = await glob(
    patterns.map((pattern) => `${pattern.replace(/\/$/, "")}/package.json`),
    { cwd: root, posix: true, ignore: ["**/node_modules/**"] }
  );
  for (const manifestPath of [...new Set(found)].sort()) {
    const result = await readManifest(path.join(root, manifestPath));
    if (!result.ok) {
      logger.warn(`ignoring ${manifestPath}: ${result.error.message}`);
      continue;
    }
    manifests.push({ dir: path.posix.dirname(manifestPath), manifest: result.value });
  }
  return manifests;
}

/**
 * Every file a manifest declares as an entry: main, module, types, typings,
 * bin and all targets of exports (subpaths and nested conditions).
 */
export function manifestEntries(info: ManifestInfo): ManifestEntry[] {
  const { manifest, dir } = info;
  const entries: ManifestEntry[] = [];
  const add = (field: string, target: string) => {
    // subpath patterns name many files; they cannot be mapped one to one
    if (target.includes("*")) return;
    entries.push({ field, path: path.posix.join(dir, target) });
  };

  for (const field of ["main", "module", "types", "typings"] as const) {
    const value = manifest[field];
    if (value) add(field, value);
  }
  if (typeof manifest.bin === "string") {
    add("bin", manifest.bin);
  } else if (manifest.bin) {
    for (const target of Object.values(manifest.bin)) add("bin", target);
  }
  for (const target of exportTargets(manifest.exports)) add("exports", target);
  return entries;
}

/**
 * Candidate source paths for a manifest path, most direct first: the path
 * itself, then the same path with a build output directory swapped for src/.
 */
export function sourceCandidates(manifestPath: string): string[] {
  const normalized = path.posix.normalize(manifestPath);
  const segments = normalized.split("/");
  const candidates = [normalized];
  const outIndex = segments.findIndex((segment) => OUTPUT_DIRS.has(segment));
  if (outIndex !== -1) {
    const swapped = [...segments];
    swapped[outIndex] = "src";
    candidates.push(swapped.join("/"));
  }
  return candidates;
}

/** Every dependency any manifest declares, of any kind */
export function declaredDependencies(manifests: readonly ManifestInfo[]): Set<string> {
  const names = new Set<string>();
  for (const { manifest } of manifests) {
    for (const deps of [manifest.dependencies, manifest.devDependencies, manifest.peerDependencies]) {
      for (const name of Object.keys(deps ?? {})) names.add(name);
    }
  }
  return names;
}

export function workspacePackages(
  manifests: readonly ManifestInfo[],
  findUnit: (candidate: string) => string | undefined
): WorkspacePackage[] {
  const packages: WorkspacePackage[] = [];
  for (const info of manifests) {
    const name = info.manifest.name;
    if (!name || info.dir === "") continue;
    const entryFiles = manifestEntries(info)
      .filter((entry) => entry.field !== "bin")
      .flatMap((entry) => sourceCandidates(entry.path))
      .map(findUnit)
      .filter((unit): unit is string => unit !== undefined);
    packages.push({ name, dir: info.dir, entryFiles });
  }
  return packages;
}

function exportTargets(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.flatMap(exportTargets);
  if (value && typeof value === "object") return Object.values(value).flatMap(exportTargets);
  return [];
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}
