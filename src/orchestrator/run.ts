// src/orchestrator/run.ts
// Pipeline driver: configuration -> graph -> plan -> execution -> report.
// Fail-fast: the first failed step stops the run; nothing after it starts.

import { basename, join } from "node:path";
import { resolveConfig, type TrainingConfig, type TrainingConfigInput } from "../config.js";
import type { ArtifactGraph, ArtifactNode, BuildPlan, NodeName, StepResult, TrainingReport } from "../types/contracts.js";
import type { ArtifactFs, ProcessLauncher } from "../types/tools.js";
import { EnvironmentError } from "../errors.js";
import { createStepRunner, type StepRunner } from "../tools/cli/exec.js";
import { errorCode, nodeFs } from "../tools/fs/nodeFs.js";
import { buildGraph, type GraphDeps } from "./graph.js";
import { COLOR, LOG_STEPS, QUIET, fmtMs } from "./log.js";
import { plan } from "./planner.js";
import { CHECKPOINT_DIR, artifactPaths, nodeName } from "./recipes.js";

export interface ExecutePlanOptions {
  /** Upper bound on steps running at once. 1 (the default) runs strictly in plan order. */
  maxParallel?: number;
}

export interface RunOptions extends ExecutePlanOptions {
  /** Node name(s) or artifact kind(s); defaults to the model's traineddata (or the line data). */
  target?: string | readonly string[];
  force?: boolean;
  stepTimeoutMs?: number;
  cleanIntermediates?: boolean;
  cwd?: string;
  fs?: ArtifactFs;
  launcher?: ProcessLauncher;
  /** Replaces the process-spawning runner entirely. */
  runner?: StepRunner;
  graph?: GraphDeps;
}

function logStart(node: ArtifactNode, idx: number, total: number) {
  if (!LOG_STEPS) return;
  console.log(`\n${COLOR.cyan("▶ step")} ${idx}/${total} ${node.name} ${COLOR.gray("— " + node.kind)}`);
}

function logResult(r: StepResult) {
  if (r.ok) {
    if (LOG_STEPS) console.log(`${COLOR.green("✓ done")} ${r.node} ${COLOR.gray("(" + fmtMs(r.durationMs) + ")")}`);
    return;
  }
  if (QUIET) return;
  const label = r.error instanceof EnvironmentError ? "✗ environment" : "✗ failed";
  console.log(`${COLOR.red(label)} ${r.node} ${COLOR.gray("(" + fmtMs(r.durationMs) + ")")} ${r.error?.message ?? ""}`);
}

async function runGuarded(runner: StepRunner, node: ArtifactNode): Promise<StepResult> {
  const t0 = Date.now();
  try {
    return await runner(node);
  } catch (e) {
    const program = node.action.type === "command" ? node.action.program : node.action.type;
    const error = new EnvironmentError(node.name, program, errorCode(e) ?? "EUNKNOWN", e);
    return { node: node.name, ok: false, exitCode: null, output: String(e), durationMs: Date.now() - t0, error };
  }
}

/**
 * Executes the plan and returns the results of every step that was started, in
 * plan order. With maxParallel > 1, a step starts once its in-plan dependencies
 * have succeeded; after a failure no new step starts but running ones finish.
 */
export async function executePlan(
  buildPlan: BuildPlan,
  runner: StepRunner,
  opts: ExecutePlanOptions = {}
): Promise<StepResult[]> {
  const steps = buildPlan.steps;
  const total = steps.length;
  const requested = opts.maxParallel ?? 1;
  const maxParallel = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : 1;

  if (maxParallel === 1) {
    const results: StepResult[] = [];
    for (const [i, node] of steps.entries()) {
      logStart(node, i + 1, total);
      const r = await runGuarded(runner, node);
      logResult(r);
      results.push(r);
      if (!r.ok) break;
    }
    return results;
  }

  const index = new Map(steps.map((n, i) => [n.name, i]));
  const results = new Map<NodeName, StepResult>();
  const succeeded = new Set<NodeName>();
  const running = new Map<NodeName, Promise<void>>();
  const pending = [...steps];
  let cancelled = false;

  const launch = (node: ArtifactNode) => {
    logStart(node, (index.get(node.name) ?? 0) + 1, total);
    running.set(
      node.name,
      (async () => {
        const r = await runGuarded(runner, node);
        logResult(r);
        results.set(node.name, r);
        if (r.ok) succeeded.add(node.name);
        else cancelled = true;
        running.delete(node.name);
      })()
    );
  };

  for (;;) {
    if (!cancelled) {
      for (let i = 0; i < pending.length && running.size < maxParallel; ) {
        const node = pending[i];
        const ready = node.dependencies.every(dep => !index.has(dep) || succeeded.has(dep));
        if (ready) {
          pending.splice(i, 1);
          launch(node);
        } else {
          i++;
        }
      }
    }
    if (running.size === 0) break;
    await Promise.race(running.values());
  }

  if (cancelled && pending.length && LOG_STEPS) {
    console.log(COLOR.gray(`  cancelled ${pending.length} step(s): ${pending.map(n => n.name).join(", ")}`));
  }
  return steps.flatMap(n => {
    const r = results.get(n.name);
    return r ? [r] : [];
  });
}

export function defaultTargets(config: TrainingConfig): NodeName[] {
  return config.linedataOnly
    ? [nodeName("starter", config.langCode), nodeName("lstmflist", config.langCode)]
    : [nodeName("traineddata", config.modelName)];
}

async function saveBoxTiff(config: TrainingConfig, fs: ArtifactFs): Promise<void> {
  const paths = artifactPaths(config);
  for (const doc of config.documents) {
    for (const file of [paths.box(doc), paths.tif(doc)]) {
      await fs.copyFile(file, join(config.outputDir, basename(file)));
    }
  }
}

/** Post-run housekeeping, recorded as a pseudo-step so failures reach the report. */
async function finishRun(config: TrainingConfig, fs: ArtifactFs, clean: boolean): Promise<StepResult | null> {
  if (!config.saveBoxTiff && !clean) return null;
  const t0 = Date.now();
  try {
    if (config.saveBoxTiff) await saveBoxTiff(config, fs);
    if (clean) {
      for (const entry of await fs.listDir(config.workDir)) {
        if (entry !== CHECKPOINT_DIR) await fs.remove(join(config.workDir, entry));
      }
    }
    return null;
  } catch (e) {
    const error = new EnvironmentError("finish", "fs", errorCode(e) ?? "EIO", e);
    return { node: "finish", ok: false, exitCode: null, output: String(e), durationMs: Date.now() - t0, error };
  }
}

export interface PreparedRun {
  config: TrainingConfig;
  graph: ArtifactGraph;
  plan: BuildPlan;
}

/** Everything up to (not including) execution. Throws ConfigurationError. */
export async function prepareRun(config: TrainingConfig, options: RunOptions = {}): Promise<PreparedRun> {
  const graph = buildGraph(config, options.graph);
  const buildPlan = await plan(graph, options.target ?? defaultTargets(config), {
    clock: options.fs ?? nodeFs,
    force: options.force
  });
  return { config, graph, plan: buildPlan };
}

export async function run(input: TrainingConfigInput, options: RunOptions = {}): Promise<TrainingReport> {
  return runResolved(resolveConfig(input, options.cwd), options);
}

export async function runResolved(resolved: TrainingConfig, options: RunOptions = {}): Promise<TrainingReport> {
  const started = Date.now();
  const startedAt = new Date(started).toISOString();
  const fs = options.fs ?? nodeFs;
  const { config, graph, plan: buildPlan } = await prepareRun(resolved, options);

  if (LOG_STEPS) {
    const stale = buildPlan.steps.length;
    console.log(
      stale === 0
        ? COLOR.green(`${buildPlan.targets.join(", ")} up to date`)
        : COLOR.magenta(`plan: ${stale} of ${graph.order.length} step(s) to build for ${buildPlan.targets.join(", ")}`)
    );
  }

  const runner =
    options.runner ??
    createStepRunner({ cwd: config.workDir, launcher: options.launcher, fs, timeoutMs: options.stepTimeoutMs });
  const steps = await executePlan(buildPlan, runner, { maxParallel: options.maxParallel });

  let success = steps.length === buildPlan.steps.length && steps.every(s => s.ok);
  if (success) {
    const finish = await finishRun(config, fs, options.cleanIntermediates ?? false);
    if (finish) {
      logResult(finish);
      steps.push(finish);
      success = false;
    }
  }

  const failed = steps.find(s => !s.ok);
  const lastTarget = buildPlan.targets[buildPlan.targets.length - 1];
  const artifactPath = success ? graph.nodes.get(lastTarget)?.outputs[0] ?? null : null;
  return {
    success,
    steps,
    plannedSteps: buildPlan.steps.length,
    artifactPath,
    failedStep: failed?.node ?? null,
    startedAt,
    durationMs: Date.now() - started
  };
}
