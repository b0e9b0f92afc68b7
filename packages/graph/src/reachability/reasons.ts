import type { DeadnessReason, ReachabilityChain, SymbolRecord } from "../model.js";

export interface Classification {
  reason: DeadnessReason;
  explanation: string;
}

/**
 * Why an unreached symbol is dead, in one word and one sentence.
 *
 * @param callers unreached symbols that refer to it
 * @param killedBy display name of the chain's disconnection point
 */
export function classify(
  symbol: SymbolRecord,
  callers: readonly string[],
  chain: ReachabilityChain,
  killedBy: string
): Classification {
  if (callers.length > 0) {
    const count = callers.length === 1 ? "1 unused symbol" : `${callers.length} unused symbols`;
    let explanation = `Only referenced by ${count}`;
    if (chain.cyclic) explanation += ", which only reference each other";
    else if (chain.killedBy !== symbol.id) explanation += `; nothing reaches ${killedBy}`;
    return { reason: "transitive", explanation };
  }
  if (symbol.kind === "type" || symbol.kind === "interface") {
    const label = symbol.kind === "type" ? "Type alias" : "Interface";
    return { reason: "unused-type", explanation: `${label} is never referenced` };
  }
  if (symbol.exported) {
    return { reason: "unused-export", explanation: "Exported but never imported" };
  }
  return { reason: "unreferenced", explanation: "Never referenced" };
}
