/**
 * Read-only view over every extracted unit, built once at the barrier
 * between extraction and resolution.
 */

import type { ImportBinding, ImportRecord, SymbolId, SymbolRecord } from "../model.js";
import type { ExtractedUnit } from "./SymbolTableBuilder.js";

export interface LocalImport {
  record: ImportRecord;
  binding: ImportBinding;
}

export class SymbolTable {
  private readonly unitsByPath = new Map<string, ExtractedUnit>();
  private readonly symbolsById = new Map<SymbolId, SymbolRecord>();
  private readonly importsByUnit = new Map<string, Map<string, LocalImport>>();
  private readonly membersByName = new Map<string, SymbolId[]>();

  constructor(units: Iterable<ExtractedUnit>) {
    const sorted = [...units].sort((a, b) => compare(a.unitPath, b.unitPath));
    for (const unit of sorted) {
      this.unitsByPath.set(unit.unitPath, unit);
      for (const symbol of unit.symbols) {
        this.symbolsById.set(symbol.id, symbol);
      }

      const locals = new Map<string, LocalImport>();
      for (const record of unit.imports) {
        if (record.reexport) continue;
        for (const binding of record.bindings) {
          locals.set(binding.local, { record, binding });
        }
      }
      this.importsByUnit.set(unit.unitPath, locals);

      for (const [ownerId, names] of unit.members) {
        if (this.symbolsById.get(ownerId)?.kind !== "class") continue;
        for (const [name, ids] of names) {
          const list = this.membersByName.get(name);
          if (list) list.push(...ids);
          else this.membersByName.set(name, [...ids]);
        }
      }
    }
  }

  unit(unitPath: string): ExtractedUnit | undefined {
    return this.unitsByPath.get(unitPath);
  }

  /** Sorted unit paths */
  unitPaths(): string[] {
    return [...this.unitsByPath.keys()];
  }

  units(): IterableIterator<ExtractedUnit> {
    return this.unitsByPath.values();
  }

  symbol(id: SymbolId): SymbolRecord | undefined {
    return this.symbolsById.get(id);
  }

  /** The import that binds `localName` in a unit, if any */
  importedBinding(unitPath: string, localName: string): LocalImport | undefined {
    return this.importsByUnit.get(unitPath)?.get(localName);
  }

  /** Every class member anywhere with this property name */
  classMembersNamed(name: string): readonly SymbolId[] {
    return this.membersByName.get(name) ?? [];
  }
}

export function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
