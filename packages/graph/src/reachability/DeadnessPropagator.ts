/**
 * Breadth-first reachability from the root set over a sealed CallGraph.
 */

import type { CallGraph } from "../CallGraph.js";
import type { ReachabilityChain, SymbolId } from "../model.js";

export interface Reachability {
  /** Reachable symbol -> BFS distance from the nearest root */
  distance: ReadonlyMap<SymbolId, number>;
  /** Reachable symbol -> the symbol BFS reached it from (roots have none) */
  via: ReadonlyMap<SymbolId, SymbolId>;
  /** Unreached symbols, sorted by id */
  candidates: SymbolId[];
}

// longest path kept per chain; anything further back is reported as truncated
const MAX_CHAIN_LENGTH = 50;

export function propagate(graph: CallGraph, roots: Iterable<SymbolId>): Reachability {
  const distance = new Map<SymbolId, number>();
  const via = new Map<SymbolId, SymbolId>();
  const queue: SymbolId[] = [];

  for (const root of roots) {
    if (distance.has(root) || !graph.has(root)) continue;
    distance.set(root, 0);
    queue.push(root);
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const depth = distance.get(current) ?? 0;
    for (const edge of graph.outgoing(current)) {
      if (distance.has(edge.to)) continue;
      distance.set(edge.to, depth + 1);
      via.set(edge.to, current);
      queue.push(edge.to);
    }
  }

  const candidates: SymbolId[] = [];
  for (const symbol of graph.symbols()) {
    if (!distance.has(symbol.id)) candidates.push(symbol.id);
  }
  candidates.sort();

  return { distance, via, candidates };
}

/** Distinct unreached callers of a candidate, itself excluded */
export function candidateCallers(
  graph: CallGraph,
  reachability: Reachability,
  id: SymbolId
): SymbolId[] {
  const callers = new Set<SymbolId>();
  for (const edge of graph.incoming(id)) {
    if (edge.from !== id && !reachability.distance.has(edge.from)) callers.add(edge.from);
  }
  return [...callers].sort();
}

/**
 * Chains for every candidate in one pass. Breadth-first from the candidates
 * nothing unreached refers to, forward through unreached callees; each
 * candidate's chain runs from the symbol that first reached it. Candidates
 * no such symbol reaches sit in or behind a cycle and are walked from the
 * lowest unvisited id.
 */
export function reachabilityChains(
  graph: CallGraph,
  reachability: Reachability
): Map<SymbolId, ReachabilityChain> {
  const unreached = new Set(reachability.candidates);
  const origin = new Map<SymbolId, SymbolId>();
  const parent = new Map<SymbolId, SymbolId>();
  const cyclicOrigins = new Set<SymbolId>();

  const spread = (queue: SymbolId[]): void => {
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === undefined) break;
      const source = origin.get(current) ?? current;
      const callees = new Set<SymbolId>();
      for (const edge of graph.outgoing(current)) {
        if (edge.to !== current && unreached.has(edge.to) && !origin.has(edge.to)) callees.add(edge.to);
      }
      for (const callee of [...callees].sort()) {
        origin.set(callee, source);
        parent.set(callee, current);
        queue.push(callee);
      }
    }
  };

  const sources = reachability.candidates.filter(
    (id) => candidateCallers(graph, reachability, id).length === 0
  );
  sources.forEach((id) => origin.set(id, id));
  spread([...sources]);

  for (const id of reachability.candidates) {
    if (origin.has(id)) continue;
    origin.set(id, id);
    cyclicOrigins.add(id);
    spread([id]);
  }

  const chains = new Map<SymbolId, ReachabilityChain>();
  for (const id of reachability.candidates) {
    const killedBy = origin.get(id) ?? id;
    const path = [id];
    let next = parent.get(id);
    while (next !== undefined && path.length <= MAX_CHAIN_LENGTH) {
      path.push(next);
      next = parent.get(next);
    }
    chains.set(id, {
      path: path.reverse(),
      killedBy,
      cyclic: cyclicOrigins.has(killedBy),
      truncated: next !== undefined,
    });
  }
  return chains;
}

/**
 * Shorten a chain to at most `maxLength` entries, keeping the disconnection
 * point and the symbol end.
 */
export function boundChain(chain: ReachabilityChain, maxLength: number): ReachabilityChain {
  if (chain.path.length <= maxLength) return chain;
  const tail = chain.path.slice(chain.path.length - Math.max(1, maxLength - 1));
  const path = maxLength > 1 ? [chain.killedBy, ...tail] : tail;
  return { ...chain, path, truncated: true };
}
