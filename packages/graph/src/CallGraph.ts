/**
 * Append-only symbol/edge store. Built once per run, then sealed; every
 * later stage only reads it.
 */

import { InvariantViolation } from "@deadwood/core";
import type { EdgeKind, ReferenceEdge, SymbolId, SymbolRecord } from "./model.js";

export interface GraphStats {
  symbols: number;
  edges: number;
  units: number;
  edgesByKind: Partial<Record<EdgeKind, number>>;
}

const NO_EDGES: readonly ReferenceEdge[] = [];

export class CallGraph {
  private readonly symbolsById = new Map<SymbolId, SymbolRecord>();
  private readonly outgoingEdges = new Map<SymbolId, ReferenceEdge[]>(); // from -> edges
  private readonly incomingEdges = new Map<SymbolId, ReferenceEdge[]>(); // to -> edges
  private readonly unitSymbols = new Map<string, SymbolId[]>(); // unit -> symbol ids
  private edgeCount = 0;
  private sealed = false;

  addSymbol(symbol: SymbolRecord): void {
    this.assertOpen("addSymbol");
    if (this.symbolsById.has(symbol.id)) {
      throw new InvariantViolation("duplicate symbol id", {
        id: symbol.id,
        unit: symbol.unitPath,
        line: symbol.span.start.line,
      });
    }
    this.symbolsById.set(symbol.id, symbol);
    appendTo(this.unitSymbols, symbol.unitPath, symbol.id);
  }

  addEdge(edge: ReferenceEdge): void {
    this.assertOpen("addEdge");
    for (const end of [edge.from, edge.to]) {
      if (!this.symbolsById.has(end)) {
        throw new InvariantViolation("edge endpoint is not a known symbol", {
          endpoint: end,
          unit: edge.unitPath,
          line: edge.line,
        });
      }
    }
    appendTo(this.outgoingEdges, edge.from, edge);
    appendTo(this.incomingEdges, edge.to, edge);
    this.edgeCount++;
  }

  /**
   * End the build phase. Any mutation afterwards is a defect.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getSymbol(id: SymbolId): SymbolRecord | undefined {
    return this.symbolsById.get(id);
  }

  has(id: SymbolId): boolean {
    return this.symbolsById.has(id);
  }

  symbols(): IterableIterator<SymbolRecord> {
    return this.symbolsById.values();
  }

  outgoing(id: SymbolId): readonly ReferenceEdge[] {
    return this.outgoingEdges.get(id) ?? NO_EDGES;
  }

  incoming(id: SymbolId): readonly ReferenceEdge[] {
    return this.incomingEdges.get(id) ?? NO_EDGES;
  }

  symbolsInUnit(unitPath: string): readonly SymbolId[] {
    return this.unitSymbols.get(unitPath) ?? [];
  }

  units(): string[] {
    return [...this.unitSymbols.keys()];
  }

  stats(): GraphStats {
    const edgesByKind: Partial<Record<EdgeKind, number>> = {};
    for (const edges of this.outgoingEdges.values()) {
      for (const edge of edges) {
        edgesByKind[edge.kind] = (edgesByKind[edge.kind] ?? 0) + 1;
      }
    }
    return {
      symbols: this.symbolsById.size,
      edges: this.edgeCount,
      units: this.unitSymbols.size,
      edgesByKind,
    };
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new InvariantViolation("call graph mutated after build phase", { operation });
    }
  }
}

function appendTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
