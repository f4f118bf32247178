import type { ArtifactGraph, ArtifactNode } from "../types/contracts.js";
import { ConfigurationError } from "../errors.js";
import { topoSort } from "./topo.js";

export function createGraph(nodes: readonly ArtifactNode[]): ArtifactGraph {
  const map = new Map<string, ArtifactNode>();
  for (const node of nodes) {
    if (map.has(node.name)) {
      throw new ConfigurationError(`Duplicate artifact node ${node.name}`, "INVALID_GRAPH");
    }
    map.set(node.name, node);
  }
  return compileGraph({ nodes: map, order: nodes.map(n => n.name) });
}

/** Structural checks: known dependencies, unique output paths, no cycles. */
export function compileGraph(draft: ArtifactGraph): ArtifactGraph {
  const producers = new Map<string, string>();
  for (const id of draft.order) {
    const node = draft.nodes.get(id);
    if (!node) throw new ConfigurationError(`Unknown node ${id} in declaration order`, "INVALID_GRAPH");
    if (node.outputs.length === 0) {
      throw new ConfigurationError(`Node ${id} declares no outputs`, "INVALID_GRAPH");
    }
    for (const dep of node.dependencies) {
      if (!draft.nodes.has(dep)) {
        throw new ConfigurationError(`Node ${id} depends on unknown node ${dep}`, "INVALID_GRAPH");
      }
    }
    for (const out of node.outputs) {
      const other = producers.get(out);
      if (other !== undefined) {
        throw new ConfigurationError(`Output ${out} is produced by both ${other} and ${id}`, "INVALID_GRAPH");
      }
      producers.set(out, id);
    }
  }
  try {
    topoSort(draft);
  } catch (e) {
    throw new ConfigurationError(e instanceof Error ? e.message : String(e), "INVALID_GRAPH");
  }
  return draft;
}
