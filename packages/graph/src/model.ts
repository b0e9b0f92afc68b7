/**
 * Domain model of one analysis run.
 */

import type { Span } from "@deadwood/syntax";
import type { CallGraph } from "./CallGraph.js";
import type { Reachability } from "./reachability/DeadnessPropagator.js";

export type SymbolKind =
  | "function"
  | "method"
  | "property"
  | "class"
  | "variable"
  | "type"
  | "interface"
  | "enum"
  | "namespace"
  | "module"; // synthetic module top-level, one per unit

export type SymbolId = string;

/** Risk annotations attached to a symbol during extraction or resolution. */
export type SymbolEvidence =
  | "dynamic-access"
  | "reflective-access"
  | "dynamic-import"
  | "decorated"
  | "parse-degraded";

export interface SymbolRecord {
  id: SymbolId;
  name: string;
  qualifiedName: string; // Owner.member for nested declarations
  kind: SymbolKind;
  unitPath: string;
  span: Span;
  exported: boolean;
  defaultExport: boolean;
  ownerId?: SymbolId;
  decorators: string[];
  evidence: Set<SymbolEvidence>;
}

export type EdgeKind =
  | "call"
  | "instantiation"
  | "type-reference"
  | "heritage"
  | "jsx-element"
  | "reference"
  | "namespace-member"
  | "member-access"
  | "module-load"
  | "dynamic-import";

export type EdgeEvidence =
  | "via-reexport"
  | "dynamic-import"
  | "string-key"
  | "receiver-unknown"
  | "namespace-escape"
  | "type-only";

export interface ReferenceEdge {
  from: SymbolId;
  to: SymbolId;
  kind: EdgeKind;
  evidence: EdgeEvidence[];
  unitPath: string; // where the usage is written
  line: number;
  column: number;
}

export interface ImportBinding {
  /** Exported name in the source unit; "default" or "*" for namespace bindings */
  imported: string;
  local: string;
  typeOnly: boolean;
}

export interface ImportRecord {
  specifier: string;
  bindings: ImportBinding[];
  typeOnly: boolean;
  /** `export ... from` rather than `import` */
  reexport: boolean;
  /** `import "./polyfill"`: loaded for its side effects only */
  sideEffect: boolean;
  line: number;
}

export type ExportBinding =
  | { kind: "local"; exportedName: string; localName: string }
  /** `export default <expression>`: the value is the module's own top level */
  | { kind: "expression"; exportedName: string }
  | { kind: "reexport"; exportedName: string; specifier: string; importedName: string }
  | { kind: "namespace-reexport"; exportedName: string; specifier: string }
  | { kind: "star"; specifier: string };

export type DiagnosticCode =
  | "parse-error"
  | "read-error"
  | "unsupported-file"
  | "config-warning";

export interface Diagnostic {
  unitPath: string;
  code: DiagnosticCode;
  message: string;
  line?: number;
  column?: number;
}

export type ConfidenceBand = "high" | "medium" | "low";

export type RiskFactor =
  | "reflective-access"
  | "dynamic-access"
  | "dynamic-import"
  | "string-property-access"
  | "framework-convention"
  | "decorated"
  | "unresolved-import"
  | "parse-degraded"
  | "transitive"
  | "class-member";

export interface FiredFactor {
  factor: RiskFactor;
  weight: number;
  detail: string;
}

export type DeadnessReason = "unused-export" | "unused-type" | "unreferenced" | "transitive";

export interface ReachabilityChain {
  /** From the disconnection point to the symbol itself */
  path: SymbolId[];
  killedBy: SymbolId;
  cyclic: boolean;
  truncated: boolean;
}

export interface Finding {
  symbol: SymbolRecord;
  score: number;
  band: ConfidenceBand;
  factors: FiredFactor[];
  reason: DeadnessReason;
  explanation: string;
  chain: ReachabilityChain;
}

export type EntryReason =
  | "explicit-file"
  | "entry-pattern"
  | `manifest:${string}`
  | "test-file"
  | "configured-export"
  | "index-fallback";

export interface AnalysisSummary {
  totalSymbols: number;
  totalUnits: number;
  reachable: number;
  /** Unreached symbols, including those ignored or below the reporting band */
  candidates: number;
  bands: Record<ConfidenceBand, number>;
  reported: number;
  roots: number;
  unresolvedReferences: number;
  failedUnits: number;
  durationMs: number;
}

export type Verdict = "dead-code-found" | "clean" | "error";

export interface AnalysisReport {
  root: string;
  /** Findings at or above the minimum confidence, ordered by location */
  findings: Finding[];
  /** Every candidate, whatever its score */
  allFindings: Finding[];
  summary: AnalysisSummary;
  diagnostics: Diagnostic[];
  verdict: Exclude<Verdict, "error">;
  roots: ReadonlyMap<SymbolId, EntryReason>;
  graph: CallGraph;
  reachability: Reachability;
}
