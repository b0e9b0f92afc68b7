/**
 * Decides which symbols are alive by definition: the module symbol and every
 * export of each entry unit, plus configured export names wherever they are
 * exported.
 */

import { Minimatch } from "minimatch";
import { ConfigurationError, Err, Ok, type Result } from "@deadwood/core";
import type { DeadwoodConfig } from "../config/schema.js";
import type { SymbolTable } from "../extraction/SymbolTable.js";
import type { Diagnostic, EntryReason, SymbolId } from "../model.js";
import type { ExportResolver } from "../resolution/ExportResolver.js";
import type { ModuleResolver } from "../resolution/ModuleResolver.js";
import { manifestEntries, sourceCandidates, type ManifestInfo } from "./manifest.js";

export interface RootSet {
  roots: Map<SymbolId, EntryReason>;
  /** Entry unit -> why it is one */
  entryUnits: Map<string, EntryReason>;
  warnings: Diagnostic[];
}

const TEST_FILE = /(^|\/)__tests__\/|\.(test|spec)\.[^/]+$/;
const FALLBACK_ENTRIES = ["index", "src/index", "main", "src/main"];

export class EntryPointResolver {
  constructor(
    private readonly table: SymbolTable,
    private readonly modules: ModuleResolver,
    private readonly exports: ExportResolver,
    private readonly entry: DeadwoodConfig["entry"],
    private readonly manifests: readonly ManifestInfo[] = []
  ) {}

  resolve(): Result<RootSet, ConfigurationError> {
    const entryUnits = new Map<string, EntryReason>();
    const warnings: Diagnostic[] = [];
    const mark = (unitPath: string, reason: EntryReason) => {
      if (!entryUnits.has(unitPath)) entryUnits.set(unitPath, reason);
    };

    for (const file of this.entry.files) {
      const found = this.modules.findUnit(file.replace(/^\.\//, ""));
      if (found) {
        mark(found, "explicit-file");
      } else {
        warnings.push({
          unitPath: file,
          code: "config-warning",
          message: `Configured entry file not found: ${file}`,
        });
      }
    }

    const patterns = this.entry.patterns.map((pattern) => new Minimatch(pattern, { dot: true }));
    const unitPaths = this.table.unitPaths();
    if (patterns.length > 0) {
      for (const unitPath of unitPaths) {
        if (patterns.some((pattern) => pattern.match(unitPath))) mark(unitPath, "entry-pattern");
      }
    }

    if (this.entry.autoDetect) {
      for (const info of this.manifests) {
        for (const declared of manifestEntries(info)) {
          const unit = sourceCandidates(declared.path)
            .map((candidate) => this.modules.findUnit(candidate))
            .find((found) => found !== undefined);
          if (unit) mark(unit, `manifest:${declared.field}`);
        }
      }
      for (const unitPath of unitPaths) {
        if (TEST_FILE.test(unitPath)) mark(unitPath, "test-file");
      }

      // explicit entries, even missing ones, switch the fallback off
      const configured = this.entry.files.length > 0 || this.entry.patterns.length > 0;
      if (entryUnits.size === 0 && !configured) {
        for (const candidate of FALLBACK_ENTRIES) {
          const found = this.modules.findUnit(candidate);
          if (found) mark(found, "index-fallback");
        }
      }
    }

    const roots = new Map<SymbolId, EntryReason>();
    for (const [unitPath, reason] of entryUnits) {
      const unit = this.table.unit(unitPath);
      if (!unit) continue;
      if (!roots.has(unit.moduleSymbol.id)) roots.set(unit.moduleSymbol.id, reason);
      for (const id of this.exports.resolveAll(unitPath)) {
        if (!roots.has(id)) roots.set(id, reason);
      }
    }

    if (this.entry.exports.length > 0) {
      const wanted = new Set(this.entry.exports);
      for (const unitPath of unitPaths) {
        for (const name of this.exports.exportedNames(unitPath)) {
          if (!wanted.has(name)) continue;
          const target = this.exports.resolve(unitPath, name);
          if (target.kind !== "symbols") continue;
          for (const id of target.ids) {
            if (!roots.has(id)) roots.set(id, "configured-export");
          }
        }
      }
    }

    if (roots.size === 0) {
      return Err(
        new ConfigurationError(
          "No entry points could be determined, so every symbol would be reported as dead",
          "Name entry files in entry.files, add globs to entry.patterns, or enable entry.autoDetect " +
            "with a package.json main/exports field or an index file."
        )
      );
    }
    return Ok({ roots, entryUnits, warnings });
  }
}
