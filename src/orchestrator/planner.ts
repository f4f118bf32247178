import type { ArtifactGraph, BuildPlan, NodeName } from "../types/contracts.js";
import type { FileClock } from "../types/tools.js";
import { ConfigurationError } from "../errors.js";
import { topoSort } from "./topo.js";

export interface PlanOptions {
  clock: FileClock;
  /** Treat every node reachable from the target as stale. */
  force?: boolean;
}

/** Accepts a node name, or an artifact kind that matches exactly one node. */
export function resolveTarget(graph: ArtifactGraph, spec: string): NodeName {
  if (graph.nodes.has(spec)) return spec;
  const byKind = graph.order.filter(id => graph.nodes.get(id)?.kind === spec);
  if (byKind.length === 1) return byKind[0];
  const hint = byKind.length > 1 ? ` (ambiguous: ${byKind.join(", ")})` : "";
  throw new ConfigurationError(`Unknown build target ${spec}${hint}`, "UNKNOWN_TARGET");
}

function closureOf(graph: ArtifactGraph, targets: readonly NodeName[]): Set<NodeName> {
  const seen = new Set<NodeName>();
  const stack = [...targets];
  while (stack.length) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    for (const dep of graph.nodes.get(id)?.dependencies ?? []) stack.push(dep);
  }
  return seen;
}

/**
 * Make-like staleness: a node is rebuilt when an output is missing, when an input
 * is newer than its oldest output, or when any dependency is rebuilt. The last rule
 * holds regardless of timestamps so clock skew cannot hide a rebuild.
 */
export async function plan(
  graph: ArtifactGraph,
  target: NodeName | readonly NodeName[],
  options: PlanOptions
): Promise<BuildPlan> {
  const requested = typeof target === "string" ? [target] : [...target];
  const targets = requested.map(spec => resolveTarget(graph, spec));
  const order = topoSort(graph, closureOf(graph, targets));

  const mtimes = new Map<string, number | undefined>();
  const mtimeOf = async (path: string) => {
    if (!mtimes.has(path)) mtimes.set(path, await options.clock.mtimeMs(path));
    return mtimes.get(path);
  };

  const stale = new Set<NodeName>();
  for (const id of order) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    if (options.force || node.dependencies.some(dep => stale.has(dep))) {
      stale.add(id);
      continue;
    }

    const outTimes = await Promise.all(node.outputs.map(mtimeOf));
    let oldestOutput = Infinity;
    let missing = false;
    for (const t of outTimes) {
      if (t === undefined) missing = true;
      else oldestOutput = Math.min(oldestOutput, t);
    }
    if (missing) {
      stale.add(id);
      continue;
    }

    const inputs = [
      ...node.dependencies.flatMap(dep => graph.nodes.get(dep)?.outputs ?? []),
      ...node.sources
    ];
    const inTimes = await Promise.all(inputs.map(mtimeOf));
    if (inTimes.some(t => t !== undefined && t > oldestOutput)) stale.add(id);
  }

  const steps = order.filter(id => stale.has(id)).flatMap(id => {
    const node = graph.nodes.get(id);
    return node ? [node] : [];
  });
  return { targets, steps };
}
