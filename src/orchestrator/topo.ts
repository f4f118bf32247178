import type { ArtifactGraph, NodeName } from "../types/contracts.js";

/**
 * Kahn's algorithm over the given subset of nodes (all of them by default).
 * Among nodes that are ready at the same time the one declared first wins, so
 * the order is deterministic.
 */
export function topoSort(graph: ArtifactGraph, subset?: ReadonlySet<NodeName>): NodeName[] {
  const members = graph.order.filter(id => !subset || subset.has(id));
  const rank = new Map(graph.order.map((id, i) => [id, i]));
  const indeg = new Map<NodeName, number>();
  const adj = new Map<NodeName, NodeName[]>();
  for (const id of members) {
    indeg.set(id, 0);
    adj.set(id, []);
  }
  for (const id of members) {
    const node = graph.nodes.get(id);
    for (const dep of node?.dependencies ?? []) {
      const consumers = adj.get(dep);
      if (!consumers) continue; // outside the subset
      consumers.push(id);
      indeg.set(id, (indeg.get(id) ?? 0) + 1);
    }
  }
  const ready: NodeName[] = members.filter(id => indeg.get(id) === 0);
  const out: NodeName[] = [];
  while (ready.length) {
    ready.sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0));
    const u = ready.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj.get(u) ?? []) {
      const left = (indeg.get(v) ?? 0) - 1;
      indeg.set(v, left);
      if (left === 0) ready.push(v);
    }
  }
  if (out.length !== members.length) {
    const stuck = members.filter(id => !out.includes(id));
    throw new Error(`Graph has cycles through: ${stuck.join(", ")}`);
  }
  return out;
}
