/**
 * Confidence that an unreached symbol is really dead.
 *
 * Starts at the baseline and subtracts the weight of every risk factor that
 * fires, in a fixed order, then clamps to [0, 100]. Weights are never
 * negative, so firing more factors can only lower a score.
 */

import type { MinimumConfidence, RiskWeights } from "../config/schema.js";
import type { FrameworkPatternProvider } from "../frameworks/types.js";
import type {
  ConfidenceBand,
  FiredFactor,
  RiskFactor,
  SymbolEvidence,
  SymbolRecord,
} from "../model.js";

/** Run-wide facts the scorer needs about one candidate */
export interface CandidateFacts {
  /** Union of evidence flags on every symbol of the candidate's unit */
  unitEvidence: ReadonlySet<SymbolEvidence>;
  stringKeys: ReadonlySet<string>;
  unresolvedNames: ReadonlySet<string>;
  dynamicImportAnywhere: boolean;
  anyUnitFailed: boolean;
  /** Referenced, but only by other unreached symbols */
  transitive: boolean;
  ownerName?: string;
}

export interface Score {
  score: number;
  band: ConfidenceBand;
  factors: FiredFactor[];
}

export interface ScoringOptions {
  baseline: number;
  weights: RiskWeights;
}

type Rule = (symbol: SymbolRecord, facts: CandidateFacts) => string | undefined;

export const BAND_THRESHOLDS = { high: 90, medium: 70, low: 0 } as const;

export function bandFor(score: number): ConfidenceBand {
  if (score >= BAND_THRESHOLDS.high) return "high";
  if (score >= BAND_THRESHOLDS.medium) return "medium";
  return "low";
}

export function meetsMinimum(score: number, minimum: MinimumConfidence): boolean {
  const threshold = typeof minimum === "number" ? minimum : BAND_THRESHOLDS[minimum];
  return score >= threshold;
}

export class ConfidenceScorer {
  private readonly rules: ReadonlyArray<[RiskFactor, Rule]>;

  constructor(
    private readonly options: ScoringOptions,
    private readonly providers: readonly FrameworkPatternProvider[] = []
  ) {
    this.rules = [
      ["reflective-access", (_, facts) =>
        facts.unitEvidence.has("reflective-access") ? "unit uses eval, Function or Reflect" : undefined],
      ["dynamic-access", (_, facts) =>
        facts.unitEvidence.has("dynamic-access") ? "unit uses computed member access" : undefined],
      ["dynamic-import", (symbol, facts) =>
        symbol.exported && facts.dynamicImportAnywhere
          ? "a module is loaded through a non-literal import() or require()"
          : undefined],
      ["string-property-access", (symbol, facts) =>
        facts.stringKeys.has(symbol.name) ? `"${symbol.name}" is used as a string key` : undefined],
      ["framework-convention", (symbol, facts) => this.convention(symbol, facts)],
      ["decorated", (symbol) =>
        symbol.decorators.length > 0 ? `decorated with @${symbol.decorators.join(", @")}` : undefined],
      ["unresolved-import", (symbol, facts) =>
        symbol.exported &&
        (facts.unresolvedNames.has(symbol.name) ||
          (symbol.defaultExport && facts.unresolvedNames.has("default")))
          ? `an import of "${symbol.name}" could not be resolved`
          : undefined],
      ["parse-degraded", (symbol, facts) => {
        if (symbol.evidence.has("parse-degraded")) return "unit has syntax errors";
        if (symbol.exported && facts.anyUnitFailed) return "some files could not be analyzed";
        return undefined;
      }],
      ["transitive", (_, facts) =>
        facts.transitive ? "only referenced by other unused code" : undefined],
      ["class-member", (symbol) =>
        symbol.kind === "method" || symbol.kind === "property"
          ? "members can be reached through untyped receivers"
          : undefined],
    ];
  }

  score(symbol: SymbolRecord, facts: CandidateFacts): Score {
    const factors: FiredFactor[] = [];
    let score = this.options.baseline;
    for (const [factor, rule] of this.rules) {
      const detail = rule(symbol, facts);
      if (detail === undefined) continue;
      const weight = this.options.weights[factor];
      factors.push({ factor, weight, detail });
      score -= weight;
    }
    const clamped = Math.max(0, Math.min(100, score));
    return { score: clamped, band: bandFor(clamped), factors };
  }

  private convention(symbol: SymbolRecord, facts: CandidateFacts): string | undefined {
    for (const provider of this.providers) {
      const result = provider.match({
        name: symbol.name,
        kind: symbol.kind,
        unitPath: symbol.unitPath,
        exported: symbol.exported,
        defaultExport: symbol.defaultExport,
        ownerName: facts.ownerName,
        decorators: symbol.decorators,
      });
      if (result.matched) return `${provider.name}: ${result.label}`;
    }
    return undefined;
  }
}
