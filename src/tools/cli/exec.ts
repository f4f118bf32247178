// src/tools/cli/exec.ts
import { spawn } from "node:child_process";
import { dirname } from "node:path";
import type { ArtifactNode, StepResult } from "../../types/contracts.js";
import type { ArtifactFs, LaunchResult, ProcessLauncher } from "../../types/tools.js";
import { EnvironmentError, StepExecutionError } from "../../errors.js";
import { COLOR, LOG_TOOLS, preview } from "../../orchestrator/log.js";
import { errorCode, nodeFs } from "../fs/nodeFs.js";

export const spawnProcess: ProcessLauncher = (req) =>
  new Promise<LaunchResult>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const child = spawn(req.program, [...req.args], {
      cwd: req.cwd,
      env: { ...process.env, ...req.env },
      stdio: ["ignore", "pipe", "pipe"]
    });
    child.stdout.on("data", (c: Buffer) => chunks.push(c));
    child.stderr.on("data", (c: Buffer) => chunks.push(c));

    if (req.timeoutMs !== undefined && req.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, req.timeoutMs);
    }

    child.once("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });
    child.once("close", (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode: code, output: Buffer.concat(chunks).toString("utf-8"), timedOut });
    });
  });

export interface ExecuteOptions {
  cwd: string;
  launcher?: ProcessLauncher;
  fs?: ArtifactFs;
  /** Kill the process and fail the step after this long. No limit by default. */
  timeoutMs?: number;
}

export type StepRunner = (node: ArtifactNode) => Promise<StepResult>;

export function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function commandLine(node: ArtifactNode): string {
  const { action } = node;
  switch (action.type) {
    case "command":
      return [action.program, ...action.args].map(quoteArg).join(" ");
    case "write":
      return `write ${quoteArg(node.outputs[0])}`;
    case "copy":
      return `copy ${quoteArg(action.from)} ${quoteArg(node.outputs[0])}`;
  }
}

function outputTimes(node: ArtifactNode, fs: ArtifactFs): Promise<(number | undefined)[]> {
  return Promise.all(node.outputs.map(out => fs.mtimeMs(out)));
}

/** Outputs that are absent, or still carry the timestamp they had before the step. */
function unwrittenOutputs(node: ArtifactNode, before: (number | undefined)[], after: (number | undefined)[]): string[] {
  return node.outputs.filter((_, i) => {
    const was = before[i];
    const now = after[i];
    return now === undefined || (was !== undefined && now <= was);
  });
}

/**
 * Runs one node's action. Failures come back as a failed StepResult, never as a
 * rejection: a non-zero exit, a timeout, or a zero exit that left a declared
 * output absent or untouched are StepExecutionErrors; a process that could not be
 * started (or a file operation that failed) is an EnvironmentError.
 */
export async function execute(node: ArtifactNode, opts: ExecuteOptions): Promise<StepResult> {
  const fs = opts.fs ?? nodeFs;
  const launcher = opts.launcher ?? spawnProcess;
  const t0 = Date.now();
  const done = (partial: Omit<StepResult, "node" | "durationMs">): StepResult => ({
    node: node.name,
    durationMs: Date.now() - t0,
    ...partial
  });

  const action = node.action;
  const program = action.type === "command" ? action.program : action.type;

  let before: (number | undefined)[];
  try {
    for (const dir of new Set([opts.cwd, ...node.outputs.map(out => dirname(out))])) {
      await fs.mkdirp(dir);
    }
    before = await outputTimes(node, fs);
  } catch (e) {
    const error = new EnvironmentError(node.name, program, errorCode(e) ?? "EIO", e);
    return done({ ok: false, exitCode: null, output: error.message, error });
  }

  if (LOG_TOOLS) console.log(COLOR.yellow(`    ↳ ${commandLine(node)}`));

  if (action.type !== "command") {
    try {
      if (action.type === "write") await fs.writeFile(node.outputs[0], action.contents);
      else await fs.copyFile(action.from, node.outputs[0]);
      return done({ ok: true, exitCode: 0, output: "" });
    } catch (e) {
      const error = new EnvironmentError(node.name, program, errorCode(e) ?? "EIO", e);
      return done({ ok: false, exitCode: null, output: error.message, error });
    }
  }

  let result: LaunchResult;
  try {
    result = await launcher({
      program: action.program,
      args: action.args,
      cwd: opts.cwd,
      env: action.env,
      timeoutMs: opts.timeoutMs
    });
  } catch (e) {
    const error = new EnvironmentError(node.name, action.program, errorCode(e) ?? "ESPAWN", e);
    return done({ ok: false, exitCode: null, output: e instanceof Error ? e.message : String(e), error });
  }

  const { exitCode, output } = result;
  if (LOG_TOOLS && output.trim().length > 0) console.log(COLOR.gray(preview(output)));
  if (result.timedOut) {
    const error = new StepExecutionError(node.name, "timeout", `killed after ${opts.timeoutMs}ms`, exitCode);
    return done({ ok: false, exitCode, output, error });
  }
  if (exitCode !== 0) {
    const error = new StepExecutionError(node.name, "exit-code", `exit code ${exitCode}`, exitCode);
    return done({ ok: false, exitCode, output, error });
  }
  const missing = unwrittenOutputs(node, before, await outputTimes(node, fs));
  if (missing.length > 0) {
    const error = new StepExecutionError(node.name, "missing-output", `expected output not written: ${missing.join(", ")}`, exitCode);
    return done({ ok: false, exitCode, output, error });
  }
  return done({ ok: true, exitCode, output });
}

export function createStepRunner(opts: ExecuteOptions): StepRunner {
  return (node) => execute(node, opts);
}
