/**
 * Fatal fault types. Parse and resolution faults are not errors: they are
 * absorbed as diagnostics and confidence evidence by the analysis itself.
 */

/**
 * The configuration cannot produce a meaningful run (no roots, bad glob,
 * contradictory options). Carries a remediation hint for the user.
 */
export class ConfigurationError extends Error {
  readonly kind = "configuration" as const;

  constructor(
    message: string,
    readonly remediation: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A defect: the analysis reached a state its own invariants rule out.
 */
export class InvariantViolation extends Error {
  readonly kind = "invariant" as const;

  constructor(
    message: string,
    readonly context: Record<string, string | number | boolean> = {}
  ) {
    super(message);
    this.name = "InvariantViolation";
  }
}

export type AnalysisFault = ConfigurationError | InvariantViolation;

export function isAnalysisFault(value: unknown): value is AnalysisFault {
  return value instanceof ConfigurationError || value instanceof InvariantViolation;
}

/**
 * Multi-line description of a fault for terminals and tool responses.
 */
export function describeFault(fault: AnalysisFault): string {
  if (fault.kind === "configuration") {
    return `Configuration error: ${fault.message}\n  Fix: ${fault.remediation}`;
  }
  const details = Object.entries(fault.context).map(([key, value]) => `  ${key}: ${value}`);
  return [`Internal error (please report): ${fault.message}`, ...details].join("\n");
}
