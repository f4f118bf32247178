export { run, runResolved, prepareRun, executePlan, defaultTargets } from "./orchestrator/run.js";
export type { RunOptions, ExecutePlanOptions, PreparedRun } from "./orchestrator/run.js";
export { buildGraph } from "./orchestrator/graph.js";
export type { GraphDeps } from "./orchestrator/graph.js";
export { plan, resolveTarget } from "./orchestrator/planner.js";
export type { PlanOptions } from "./orchestrator/planner.js";
export { createGraph, compileGraph } from "./orchestrator/compiler.js";
export { topoSort } from "./orchestrator/topo.js";
export { RECIPES, ARTIFACT_KINDS, artifactPaths, nodeName } from "./orchestrator/recipes.js";
export { execute, createStepRunner, spawnProcess, commandLine } from "./tools/cli/exec.js";
export type { ExecuteOptions, StepRunner } from "./tools/cli/exec.js";
export { nodeFs } from "./tools/fs/nodeFs.js";
export { buildToolRegistry, findOnPath } from "./tools/registry.js";
export { resolveConfig, documentsFromFonts, makeFontName, trainingConfigSchema } from "./config.js";
export type { TrainingConfig, TrainingConfigInput, TrainingDocument, TrainingDocumentInput } from "./config.js";
export { languageProfile } from "./language.js";
export { ConfigurationError, StepExecutionError, EnvironmentError } from "./errors.js";
export type * from "./types/contracts.js";
export type * from "./types/tools.js";
