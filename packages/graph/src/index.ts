/**
 * @deadwood/graph
 * Reference graph, reachability and confidence scoring.
 */

// Model
export type {
  SymbolKind,
  SymbolId,
  SymbolRecord,
  SymbolEvidence,
  EdgeKind,
  EdgeEvidence,
  ReferenceEdge,
  ImportBinding,
  ImportRecord,
  ExportBinding,
  Diagnostic,
  DiagnosticCode,
  ConfidenceBand,
  RiskFactor,
  FiredFactor,
  DeadnessReason,
  ReachabilityChain,
  Finding,
  EntryReason,
  AnalysisSummary,
  Verdict,
  AnalysisReport,
} from "./model.js";

// Graph
export { CallGraph, type GraphStats } from "./CallGraph.js";
export {
  propagate,
  reachabilityChains,
  boundChain,
  type Reachability,
} from "./reachability/DeadnessPropagator.js";

// Configuration
export {
  type DeadwoodConfig,
  type ConfigInput,
  type RiskWeights,
  type OutputFormat,
  type MinimumConfidence,
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE,
  defaultConfig,
} from "./config/schema.js";
export {
  type ConfigOverrides,
  type LoadedConfig,
  CONFIG_FILES,
  loadConfig,
  applyOverrides,
  validateConfig,
  writeDefaultConfig,
} from "./config/loader.js";

// Frameworks
export type { FrameworkPatternProvider, SymbolShape, ConventionMatch } from "./frameworks/types.js";
export { BUILTIN_PROVIDERS } from "./frameworks/builtin.js";

// Scoring
export { BAND_THRESHOLDS, bandFor, meetsMinimum } from "./scoring/ConfidenceScorer.js";

// Analysis
export { AnalysisRun, scanOptions, type AnalysisRunOptions } from "./AnalysisRun.js";
export { AnalysisSession, type AnalyzeRequest, type Explanation } from "./AnalysisSession.js";

// Reports
export {
  type SerializedFinding,
  type SerializedReport,
  type SerializedWarning,
  symbolLabel,
  serializeFinding,
  serializeReport,
} from "./report/serialize.js";
export { summaryLines, compactLine } from "./report/text.js";

// Tools
export { registerAllTools, type Services } from "./tools/index.js";
