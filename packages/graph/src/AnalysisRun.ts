/**
 * One end-to-end analysis: scan, extract, resolve, root, propagate, score.
 *
 * A run owns every piece of state it builds and is executed once. Nothing is
 * shared between runs.
 */

import * as path from "node:path";
import {
  ConfigurationError,
  Err,
  InvariantViolation,
  Ok,
  silentLogger,
  type AnalysisFault,
  type Logger,
  toError,
  type Result,
} from "@deadwood/core";
import {
  NodeFileSystem,
  NodeProjectScanner,
  TreeSitterParser,
  type FileSystem,
  type Parser,
  type ProjectScanner,
  type ScanOptions,
} from "@deadwood/syntax";
import { CallGraph } from "./CallGraph.js";
import { validateConfig } from "./config/loader.js";
import { TEST_EXCLUDES, type DeadwoodConfig } from "./config/schema.js";
import { EntryPointResolver } from "./entry/EntryPointResolver.js";
import { declaredDependencies, loadManifests, workspacePackages } from "./entry/manifest.js";
import { SymbolTable, compare } from "./extraction/SymbolTable.js";
import { extractUnit, type ExtractedUnit } from "./extraction/SymbolTableBuilder.js";
import { selectProviders } from "./frameworks/registry.js";
import type { FrameworkPatternProvider } from "./frameworks/types.js";
import type {
  AnalysisReport,
  ConfidenceBand,
  Diagnostic,
  Finding,
  SymbolEvidence,
} from "./model.js";
import {
  boundChain,
  candidateCallers,
  propagate,
  reachabilityChains,
} from "./reachability/DeadnessPropagator.js";
import { classify } from "./reachability/reasons.js";
import { ExportResolver } from "./resolution/ExportResolver.js";
import { ModuleResolver } from "./resolution/ModuleResolver.js";
import { ReferenceResolver, type UnitResolution } from "./resolution/ReferenceResolver.js";
import { loadPathAliases } from "./resolution/tsconfig.js";
import { ConfidenceScorer, meetsMinimum } from "./scoring/ConfidenceScorer.js";

export interface AnalysisRunOptions {
  /** Absolute project root */
  root: string;
  config: DeadwoodConfig;
  parser?: Parser;
  scanner?: ProjectScanner;
  fileSystem?: FileSystem;
  logger?: Logger;
  /** Providers to choose from; the built-in set by default */
  providers?: readonly FrameworkPatternProvider[];
}

interface UnitOutcome {
  unit?: ExtractedUnit;
  diagnostics: Diagnostic[];
}

export class AnalysisRun {
  private readonly parser: Parser;
  private readonly scanner: ProjectScanner;
  private readonly fileSystem: FileSystem;
  private readonly logger: Logger;
  private executed = false;

  constructor(private readonly options: AnalysisRunOptions) {
    this.parser = options.parser ?? new TreeSitterParser();
    this.scanner = options.scanner ?? new NodeProjectScanner();
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.logger = options.logger ?? silentLogger;
  }

  async execute(): Promise<Result<AnalysisReport, AnalysisFault>> {
    if (this.executed) {
      return Err(new InvariantViolation("analysis run executed twice", { root: this.options.root }));
    }
    this.executed = true;

    try {
      return await this.pipeline();
    } catch (error) {
      // graph invariants are thrown where they are detected and reported here
      if (error instanceof InvariantViolation) return Err(error);
      throw error;
    }
  }

  private async pipeline(): Promise<Result<AnalysisReport, AnalysisFault>> {
    const started = Date.now();
    const { root } = this.options;

    const validated = validateConfig(this.options.config);
    if (!validated.ok) return validated;
    const config = validated.value;

    const scanned = await this.scanner.scan(root, scanOptions(config));
    if (!scanned.ok) {
      return Err(
        new ConfigurationError(
          `Cannot scan ${root}: ${scanned.error.message}`,
          "Check that the path exists and is a readable directory."
        )
      );
    }
    const files = scanned.value;
    this.logger.debug(`scanned ${files.length} file(s)`);

    // Phase 1: every unit on its own
    let mark = Date.now();
    const outcomes = await Promise.all(files.map((file) => this.extract(file)));
    const diagnostics = outcomes.flatMap((outcome) => outcome.diagnostics);
    const units = outcomes
      .map((outcome) => outcome.unit)
      .filter((unit): unit is ExtractedUnit => unit !== undefined);
    const failedUnits = outcomes.length - units.length;
    this.logger.debug(`extracted ${units.length} unit(s) in ${Date.now() - mark}ms`);

    // Barrier
    const table = new SymbolTable(units);
    const graph = new CallGraph();
    for (const unit of table.units()) {
      for (const symbol of unit.symbols) graph.addSymbol(symbol);
    }

    const manifests = await loadManifests(root, this.logger);
    const locator = new ModuleResolver(table.unitPaths());
    const aliases = loadPathAliases(root);
    if (!aliases.ok) {
      this.logger.warn(`ignoring tsconfig.json paths: ${aliases.error.message}`);
      diagnostics.push({ unitPath: "tsconfig.json", code: "config-warning", message: aliases.error.message });
    }
    const modules = new ModuleResolver(table.unitPaths(), {
      aliases: aliases.ok ? aliases.value : undefined,
      workspacePackages: workspacePackages(manifests, (candidate) => locator.findUnit(candidate)),
    });
    const exports = new ExportResolver(table, modules, config.analysis.maxReexportDepth);

    // Phase 2: every unit against the shared table, into its own buffer
    mark = Date.now();
    const resolver = new ReferenceResolver(table, modules, exports, this.logger);
    const resolutions = await Promise.all(
      [...table.units()].map(async (unit) => resolver.resolveUnit(unit))
    );
    const merged = mergeResolutions(graph, table, resolutions);
    graph.seal();
    this.logger.debug(
      `resolved ${graph.stats().edges} edge(s) in ${Date.now() - mark}ms, ${merged.unresolvedReferences} unresolved`
    );

    const rooted = new EntryPointResolver(table, modules, exports, config.entry, manifests).resolve();
    if (!rooted.ok) return rooted;
    for (const warning of rooted.value.warnings) {
      this.logger.warn(warning.message);
      diagnostics.push(warning);
    }
    const roots = rooted.value.roots;

    const selection = selectProviders(
      config.plugins,
      declaredDependencies(manifests),
      this.options.providers
    );
    for (const name of selection.unknown) {
      diagnostics.push({ unitPath: "", code: "config-warning", message: `Unknown plugin: ${name}` });
    }
    if (selection.providers.length > 0) {
      this.logger.debug(`framework providers: ${selection.providers.map((p) => p.name).join(", ")}`);
    }

    const reachability = propagate(graph, roots.keys());
    const scorer = new ConfidenceScorer(config.confidence, selection.providers);
    const unitEvidence = evidenceByUnit(graph);
    const ignored = config.analysis.ignorePatterns.map((pattern) => new RegExp(pattern));
    const chains = reachabilityChains(graph, reachability);

    const allFindings: Finding[] = [];
    for (const id of reachability.candidates) {
      const symbol = graph.getSymbol(id);
      if (!symbol || symbol.kind === "module") continue;
      if (config.analysis.ignoreSymbols.includes(symbol.name)) continue;
      if (ignored.some((pattern) => pattern.test(symbol.name))) continue;
      if (!config.analysis.includeTypes && (symbol.kind === "type" || symbol.kind === "interface")) {
        continue;
      }

      const callers = candidateCallers(graph, reachability, id);
      const found = chains.get(id);
      if (!found) throw new InvariantViolation("candidate without a reachability chain", { symbol: id });
      const chain = boundChain(found, config.output.maxChainLength);
      const owner = symbol.ownerId ? graph.getSymbol(symbol.ownerId) : undefined;
      const scored = scorer.score(symbol, {
        unitEvidence: unitEvidence.get(symbol.unitPath) ?? new Set(),
        stringKeys: merged.stringKeys,
        unresolvedNames: merged.unresolvedNames,
        dynamicImportAnywhere: merged.dynamicImportAnywhere,
        anyUnitFailed: failedUnits > 0,
        transitive: callers.length > 0,
        ownerName: owner?.kind === "module" ? undefined : owner?.name,
      });
      const killedBy = graph.getSymbol(chain.killedBy)?.qualifiedName ?? chain.killedBy;
      allFindings.push({ symbol, ...scored, ...classify(symbol, callers, chain, killedBy), chain });
    }

    allFindings.sort(byLocation);
    const findings = allFindings.filter((finding) =>
      meetsMinimum(finding.score, config.confidence.minimum)
    );

    const bands: Record<ConfidenceBand, number> = { high: 0, medium: 0, low: 0 };
    for (const finding of allFindings) bands[finding.band]++;

    let totalSymbols = 0;
    let reachable = 0;
    for (const symbol of graph.symbols()) {
      if (symbol.kind === "module") continue;
      totalSymbols++;
      if (reachability.distance.has(symbol.id)) reachable++;
    }

    const durationMs = Date.now() - started;
    this.logger.debug(`analysis finished in ${durationMs}ms`);

    return Ok({
      root,
      findings,
      allFindings,
      summary: {
        totalSymbols,
        totalUnits: units.length,
        reachable,
        candidates: totalSymbols - reachable,
        bands,
        reported: findings.length,
        roots: roots.size,
        unresolvedReferences: merged.unresolvedReferences,
        failedUnits,
        durationMs,
      },
      diagnostics,
      verdict: findings.length > 0 ? "dead-code-found" : "clean",
      roots,
      graph,
      reachability,
    });
  }

  private async extract(file: string): Promise<UnitOutcome> {
    const read = await this.fileSystem.read(path.join(this.options.root, file));
    if (!read.ok) {
      this.logger.warn(`${file}: ${read.error.message}`);
      return { diagnostics: [{ unitPath: file, code: "read-error", message: read.error.message }] };
    }

    const parsed = await this.parser.parse(read.value, file);
    if (!parsed.ok) {
      this.logger.warn(`${file}: ${parsed.error.message}`);
      const code = this.parser.detectLanguage(file) ? "parse-error" : "unsupported-file";
      return { diagnostics: [{ unitPath: file, code, message: parsed.error.message }] };
    }

    const diagnostics: Diagnostic[] = parsed.value.errors.map((error) => ({
      unitPath: file,
      code: "parse-error",
      message: error.message,
      line: error.span.start.line,
      column: error.span.start.column,
    }));
    if (diagnostics.length > 0) {
      this.logger.warn(`${file}: ${diagnostics.length} syntax error(s), results for it are less certain`);
    }
    try {
      return { unit: extractUnit(parsed.value, file, diagnostics), diagnostics };
    } catch (error) {
      const message = `extraction failed: ${toError(error).message}`;
      this.logger.warn(`${file}: ${message}`);
      return { diagnostics: [...diagnostics, { unitPath: file, code: "parse-error", message }] };
    }
  }
}

/** Discovery globs for a configuration; test globs drop out under includeTests */
export function scanOptions(config: DeadwoodConfig): ScanOptions {
  const exclude = config.analysis.includeTests
    ? config.exclude.filter((pattern) => !TEST_EXCLUDES.has(pattern))
    : config.exclude;
  return { include: config.include, exclude };
}

interface MergedResolutions {
  stringKeys: Set<string>;
  unresolvedNames: Set<string>;
  unresolvedReferences: number;
  dynamicImportAnywhere: boolean;
}

/** Apply per-unit buffers to the graph, in unit-path order. */
function mergeResolutions(
  graph: CallGraph,
  table: SymbolTable,
  resolutions: readonly UnitResolution[]
): MergedResolutions {
  const merged: MergedResolutions = {
    stringKeys: new Set(),
    unresolvedNames: new Set(),
    unresolvedReferences: 0,
    dynamicImportAnywhere: false,
  };
  const ordered = [...resolutions].sort((a, b) => compare(a.unitPath, b.unitPath));
  for (const resolution of ordered) {
    for (const edge of resolution.edges) graph.addEdge(edge);
    for (const { symbolId, flag } of resolution.evidence) {
      table.symbol(symbolId)?.evidence.add(flag);
      if (flag === "dynamic-import") merged.dynamicImportAnywhere = true;
    }
    resolution.stringKeys.forEach((key) => merged.stringKeys.add(key));
    resolution.unresolvedNames.forEach((name) => merged.unresolvedNames.add(name));
    merged.unresolvedReferences += resolution.unresolvedReferences;
  }
  return merged;
}

function evidenceByUnit(graph: CallGraph): Map<string, Set<SymbolEvidence>> {
  const byUnit = new Map<string, Set<SymbolEvidence>>();
  for (const unitPath of graph.units()) {
    const flags = new Set<SymbolEvidence>();
    for (const id of graph.symbolsInUnit(unitPath)) {
      graph.getSymbol(id)?.evidence.forEach((flag) => flags.add(flag));
    }
    byUnit.set(unitPath, flags);
  }
  return byUnit;
}

function byLocation(a: Finding, b: Finding): number {
  return (
    compare(a.symbol.unitPath, b.symbol.unitPath) ||
    a.symbol.span.start.line - b.symbol.span.start.line ||
    a.symbol.span.start.column - b.symbol.span.start.column ||
    compare(a.symbol.id, b.symbol.id)
  );
}
