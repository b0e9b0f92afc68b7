import type { SymbolKind } from "../model.js";

/** What a provider may look at. Never the tree, never the graph. */
export interface SymbolShape {
  name: string;
  kind: SymbolKind;
  unitPath: string;
  exported: boolean;
  defaultExport: boolean;
  ownerName?: string;
  decorators: readonly string[];
}

export type ConventionMatch = { matched: false } | { matched: true; label: string };

export interface FrameworkPatternProvider {
  name: string;
  /** Packages whose presence in a manifest turns the provider on */
  detect(dependencies: ReadonlySet<string>): boolean;
  match(symbol: SymbolShape): ConventionMatch;
}

export const NO_MATCH: ConventionMatch = { matched: false };

export function matched(label: string): ConventionMatch {
  return { matched: true, label };
}
