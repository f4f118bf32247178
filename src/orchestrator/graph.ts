import { accessSync, constants, statSync } from "node:fs";
import type { TrainingConfig } from "../config.js";
import type { ArtifactGraph, ArtifactNode } from "../types/contracts.js";
import type { ToolResolver } from "../types/tools.js";
import { ConfigurationError } from "../errors.js";
import { buildToolRegistry, findOnPath, toolSearchDirs } from "../tools/registry.js";
import { createGraph } from "./compiler.js";
import { ARTIFACT_KINDS, RECIPES, artifactPaths, isTrainingKind } from "./recipes.js";

export interface GraphDeps {
  resolver?: ToolResolver;
  /** Defaults to the configured tool directory followed by PATH. */
  searchDirs?: readonly string[];
  isReadableFile?: (path: string) => boolean;
}

export function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * One node per artifact the configuration calls for. Documents are checked and
 * tools resolved here, once, so a bad configuration fails before anything runs.
 */
export function buildGraph(config: TrainingConfig, deps: GraphDeps = {}): ArtifactGraph {
  const readable = deps.isReadableFile ?? isReadableFile;

  for (const doc of config.documents) {
    if (!readable(doc.text)) {
      throw new ConfigurationError(
        `Training document ${doc.id} (font ${doc.font}) has no readable ground-truth text at ${doc.text}`,
        "MISSING_DOCUMENT"
      );
    }
  }

  const langConfigPath = `${artifactPaths(config).langdataPrefix}.config`;
  const langConfig = readable(langConfigPath) ? langConfigPath : undefined;

  const kinds = ARTIFACT_KINDS.filter(kind => !(config.linedataOnly && isTrainingKind(kind)));
  const drafts: ArtifactNode[] = [];
  for (const doc of config.documents) {
    for (const kind of kinds) {
      if (RECIPES[kind].scope === "document") drafts.push(RECIPES[kind].build({ config, langConfig, doc }));
    }
  }
  for (const scope of ["language", "model"] as const) {
    for (const kind of kinds) {
      if (RECIPES[kind].scope === scope) drafts.push(RECIPES[kind].build({ config, langConfig }));
    }
  }

  const programs = kinds.flatMap(kind => {
    const program = RECIPES[kind].program;
    return program ? [program] : [];
  });
  const registry = buildToolRegistry(
    programs,
    deps.searchDirs ?? toolSearchDirs(config.toolDir),
    deps.resolver ?? findOnPath
  );

  const nodes = drafts.map((draft): ArtifactNode => {
    if (draft.action.type !== "command") return draft;
    const resolved = registry[draft.action.program];
    if (resolved === undefined) {
      throw new ConfigurationError(`Tool ${draft.action.program} was not resolved`, "TOOL_NOT_FOUND");
    }
    return { ...draft, action: { ...draft.action, program: resolved } };
  });

  return createGraph(nodes);
}
