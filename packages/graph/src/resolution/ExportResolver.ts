/**
 * Follows export chains (`export { x } from`, `export *`, `export * as ns`)
 * to the symbols they finally name.
 *
 * Iterative with an explicit visited set, so cyclic re-exports terminate
 * and chains longer than the configured depth are cut rather than followed.
 */

import type { SymbolTable } from "../extraction/SymbolTable.js";
import type { SymbolId } from "../model.js";
import type { ModuleResolver } from "./ModuleResolver.js";

export type UnresolvedReason = "missing" | "cycle" | "depth" | "module";

export type ExportTarget =
  | { kind: "symbols"; ids: SymbolId[]; viaReexport: boolean }
  /** `export * as ns from`: the name stands for a whole unit */
  | { kind: "namespace"; unitPath: string; viaReexport: boolean }
  | { kind: "external" }
  | { kind: "unresolved"; reason: UnresolvedReason };

interface Frame {
  unitPath: string;
  name: string;
  depth: number;
  viaReexport: boolean;
}

export class ExportResolver {
  private readonly resolved = new Map<string, ExportTarget>();
  private readonly names = new Map<string, string[]>();

  constructor(
    private readonly table: SymbolTable,
    private readonly modules: ModuleResolver,
    private readonly maxDepth: number
  ) {}

  resolve(unitPath: string, exportedName: string): ExportTarget {
    const key = `${unitPath}\0${exportedName}`;
    const cached = this.resolved.get(key);
    if (cached) return cached;
    const target = this.follow(unitPath, exportedName);
    this.resolved.set(key, target);
    return target;
  }

  /** Every name a unit exports, including names reached through `export *` */
  exportedNames(unitPath: string): string[] {
    const cached = this.names.get(unitPath);
    if (cached) return cached;

    const names = new Set<string>();
    const seen = new Set<string>();
    const pending: Array<{ unitPath: string; depth: number }> = [{ unitPath, depth: 0 }];
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next || seen.has(next.unitPath) || next.depth > this.maxDepth) continue;
      seen.add(next.unitPath);
      const unit = this.table.unit(next.unitPath);
      if (!unit) continue;

      for (const binding of unit.exports) {
        if (binding.kind !== "star") {
          // `export *` never forwards a default export
          if (next.depth === 0 || binding.exportedName !== "default") names.add(binding.exportedName);
          continue;
        }
        const target = this.modules.resolve(binding.specifier, next.unitPath);
        if (target.kind === "unit") pending.push({ unitPath: target.path, depth: next.depth + 1 });
      }
    }

    const sorted = [...names].sort();
    this.names.set(unitPath, sorted);
    return sorted;
  }

  /**
   * Symbols behind every export of a unit. Namespace re-exports expand to the
   * exports of the unit they name.
   */
  resolveAll(unitPath: string): SymbolId[] {
    const ids = new Set<SymbolId>();
    const seen = new Set<string>();
    const pending = [unitPath];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      for (const name of this.exportedNames(current)) {
        const target = this.resolve(current, name);
        if (target.kind === "symbols") target.ids.forEach((id) => ids.add(id));
        else if (target.kind === "namespace") pending.push(target.unitPath);
      }
    }
    return [...ids];
  }

  private follow(unitPath: string, exportedName: string): ExportTarget {
    const stack: Frame[] = [{ unitPath, name: exportedName, depth: 0, viaReexport: false }];
    const visited = new Set<string>();
    let sawCycle = false;
    let sawDepth = false;
    let sawMissingModule = false;

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      const key = `${frame.unitPath}\0${frame.name}`;
      if (visited.has(key)) {
        sawCycle = true;
        continue;
      }
      visited.add(key);

      if (frame.depth > this.maxDepth) {
        sawDepth = true;
        continue;
      }

      const unit = this.table.unit(frame.unitPath);
      if (!unit) {
        sawMissingModule = true;
        continue;
      }

      const binding = unit.exports.find(
        (candidate) => candidate.kind !== "star" && candidate.exportedName === frame.name
      );

      if (binding) {
        switch (binding.kind) {
          case "local": {
            const ids = unit.topLevel.get(binding.localName);
            if (ids && ids.length > 0) {
              return { kind: "symbols", ids: [...ids], viaReexport: frame.viaReexport };
            }
            continue;
          }
          case "expression":
            return { kind: "symbols", ids: [unit.moduleSymbol.id], viaReexport: frame.viaReexport };
          case "reexport": {
            const target = this.modules.resolve(binding.specifier, frame.unitPath);
            if (target.kind === "external") return { kind: "external" };
            if (target.kind === "unresolved") {
              sawMissingModule = true;
              continue;
            }
            stack.push({
              unitPath: target.path,
              name: binding.importedName,
              depth: frame.depth + 1,
              viaReexport: true,
            });
            continue;
          }
          case "namespace-reexport": {
            const target = this.modules.resolve(binding.specifier, frame.unitPath);
            if (target.kind === "external") return { kind: "external" };
            if (target.kind === "unresolved") {
              sawMissingModule = true;
              continue;
            }
            return { kind: "namespace", unitPath: target.path, viaReexport: true };
          }
        }
      }

      if (frame.name === "default") continue;

      // first matching `export *` wins, in source order
      const stars = unit.exports.filter((candidate) => candidate.kind === "star");
      for (let i = stars.length - 1; i >= 0; i--) {
        const star = stars[i];
        if (!star || star.kind !== "star") continue;
        const target = this.modules.resolve(star.specifier, frame.unitPath);
        if (target.kind !== "unit") continue;
        stack.push({
          unitPath: target.path,
          name: frame.name,
          depth: frame.depth + 1,
          viaReexport: true,
        });
      }
    }

    const reason: UnresolvedReason = sawDepth
      ? "depth"
      : sawCycle
        ? "cycle"
        : sawMissingModule
          ? "module"
          : "missing";
    return { kind: "unresolved", reason };
  }
}
