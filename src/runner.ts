// src/runner.ts
// Command-line entry point:
// - flags accept `--name value`, `--name=value`, and several values for list flags
// - `--config file.json` supplies a base configuration, flags override it
// - documents come from `--doc id=font:path` or from `--training-text` x `--fontlist` x `--exposures`
// - exit code 0 on success, 1 when a step failed, 2 for configuration or usage errors
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  defaultExposures,
  documentsFromFonts,
  envDefaults,
  resolveConfig,
  type TrainingDocumentInput
} from './config.js';
import { ConfigurationError } from './errors.js';
import { COLOR, QUIET, preview } from './orchestrator/log.js';
import { runResolved, type RunOptions } from './orchestrator/run.js';
import { writeReport } from './report/materialize.js';
import type { TrainingReport } from './types/contracts.js';

const USAGE = `Usage: ocr-trainflow --lang <code> --output-dir <dir> --langdata-dir <dir> --tessdata-dir <dir>
       (--training-text <file>... --fontlist <font>... [--exposures <n>...] | --doc <id>=<font>:<text>...)
       [--model <name>] [--linedata-only] [--net-spec <spec> | --continue-from <checkpoint>]
       [--work-dir <dir>] [--fonts-dir <dir>] [--tool-dir <dir>] [--psm <n>] [--ptsize <n>] [--max-pages <n>]
       [--max-iterations <n>] [--learning-rate <x>] [--target-error-rate <x>] [--old-traineddata <file>]
       [--target <name>...] [--force] [--clean-intermediates | --keep-intermediates] [--save-box-tiff]
       [--jobs <n>] [--timeout-s <n>] [--config <file.json>] [--distort-image]

--clean-intermediates empties the work directory after a successful run but keeps its checkpoints/.`;

const BOOL_FLAGS = new Set([
  'force', 'linedata-only', 'clean-intermediates', 'keep-intermediates',
  'save-box-tiff', 'distort-image', 'help'
]);
const LIST_FLAGS = new Set(['training-text', 'fontlist', 'exposures', 'doc', 'target', 'text2image-arg']);
const VALUE_FLAGS = new Set([
  'config', 'lang', 'model', 'langdata-dir', 'tessdata-dir', 'fonts-dir', 'tool-dir', 'work-dir', 'output-dir',
  'psm', 'ptsize', 'max-pages', 'leading', 'char-spacing', 'max-iterations', 'net-spec', 'continue-from',
  'old-traineddata', 'learning-rate', 'target-error-rate', 'jobs', 'timeout-s', 'run-id'
]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  values: Map<string, string>;
  lists: Map<string, string[]>;
  bools: Set<string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { values: new Map(), lists: new Map(), bools: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) throw new UsageError(`Unexpected argument: ${a}`);
    const eq = a.indexOf('=');
    const name = (eq > 0 ? a.slice(2, eq) : a.slice(2)).replace(/_/g, '-');
    const inline = eq > 0 ? a.slice(eq + 1) : undefined;

    if (BOOL_FLAGS.has(name)) {
      if (inline !== undefined) throw new UsageError(`--${name} takes no value`);
      out.bools.add(name);
    } else if (LIST_FLAGS.has(name)) {
      const list = out.lists.get(name) ?? [];
      if (inline !== undefined) list.push(inline);
      while (i + 1 < argv.length && !argv[i + 1].startsWith('--')) list.push(argv[++i]);
      if (list.length === 0) throw new UsageError(`--${name} needs at least one value`);
      out.lists.set(name, list);
    } else if (VALUE_FLAGS.has(name)) {
      const value = inline ?? (i + 1 < argv.length && !argv[i + 1].startsWith('--') ? argv[++i] : undefined);
      if (value === undefined) throw new UsageError(`--${name} needs a value`);
      out.values.set(name, value);
    } else {
      throw new UsageError(`Unknown option --${name}`);
    }
  }
  return out;
}

/** `id=font:path`; the font ends at the first colon after the `=`. */
export function parseDocSpec(spec: string): TrainingDocumentInput {
  const eq = spec.indexOf('=');
  const colon = spec.indexOf(':', eq + 1);
  if (eq <= 0 || colon <= eq + 1 || colon === spec.length - 1) {
    throw new UsageError(`Malformed --doc ${spec}; expected <id>=<font>:<text file>`);
  }
  return { id: spec.slice(0, eq), font: spec.slice(eq + 1, colon), text: spec.slice(colon + 1) };
}

function toNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) throw new UsageError(`--${name} expects a number, got ${raw}`);
  return n;
}

function num(args: ParsedArgs, name: string): number | undefined {
  const raw = args.values.get(name);
  return raw === undefined ? undefined : toNumber(name, raw);
}

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Failed to read config file ${file}: ${e instanceof Error ? e.message : String(e)}`, 'INVALID_CONFIG');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`, 'INVALID_CONFIG');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function definedOnly(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export interface CliInvocation {
  input: Record<string, unknown>;
  options: RunOptions;
  runId: string;
}

/**
 * Merges env defaults, the optional JSON config file and the flags. The result
 * is validated by resolveConfig.
 */
export function buildInvocation(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): CliInvocation {
  const envCfg = envDefaults(env);
  const configFile = args.values.get('config');
  const base = configFile ? readConfigFile(configFile) : {};
  const v = (name: string) => args.values.get(name);

  const lang = v('lang') ?? (typeof base.langCode === 'string' ? base.langCode : undefined);

  let documents: TrainingDocumentInput[] | undefined;
  const docSpecs = args.lists.get('doc');
  const corpus = args.lists.get('training-text');
  const fonts = args.lists.get('fontlist');
  if (docSpecs) {
    documents = docSpecs.map(parseDocSpec);
  } else if (corpus || fonts) {
    if (!corpus || !fonts) throw new UsageError('--training-text and --fontlist must be given together');
    const exposures = args.lists.get('exposures')?.map(raw => toNumber('exposures', raw)) ?? defaultExposures(lang ?? '');
    documents = documentsFromFonts({ corpus, fonts, exposures });
  }

  const baseTraining = typeof base.training === 'object' && base.training !== null ? base.training : {};
  const training = definedOnly({
    ...baseTraining,
    ...definedOnly({
      netSpec: v('net-spec'),
      continueFrom: v('continue-from'),
      oldTraineddata: v('old-traineddata'),
      maxIterations: num(args, 'max-iterations'),
      learningRate: num(args, 'learning-rate'),
      targetErrorRate: num(args, 'target-error-rate')
    })
  });

  const merged: Record<string, unknown> = {
    ...definedOnly({
      tessdataDir: envCfg.tessdataDir,
      langdataDir: envCfg.langdataDir,
      fontsDir: envCfg.fontsDir,
      toolDir: envCfg.toolDir
    }),
    ...base,
    ...definedOnly({
      langCode: lang,
      modelName: v('model') ?? (typeof base.modelName === 'string' ? undefined : lang),
      documents,
      outputDir: v('output-dir'),
      workDir: v('work-dir'),
      langdataDir: v('langdata-dir'),
      tessdataDir: v('tessdata-dir'),
      fontsDir: v('fonts-dir'),
      toolDir: v('tool-dir'),
      psm: num(args, 'psm'),
      ptsize: num(args, 'ptsize'),
      maxPages: num(args, 'max-pages'),
      leading: num(args, 'leading'),
      charSpacing: num(args, 'char-spacing'),
      text2imageExtraArgs: args.lists.get('text2image-arg'),
      distortImage: args.bools.has('distort-image') ? true : undefined,
      linedataOnly: args.bools.has('linedata-only') ? true : undefined,
      saveBoxTiff: args.bools.has('save-box-tiff') ? true : undefined
    }),
    training
  };

  const jobs = num(args, 'jobs') ?? envCfg.maxParallel;
  const timeoutS = num(args, 'timeout-s');
  const options: RunOptions = {
    target: args.lists.get('target'),
    force: args.bools.has('force'),
    cleanIntermediates: args.bools.has('clean-intermediates') && !args.bools.has('keep-intermediates'),
    maxParallel: jobs,
    stepTimeoutMs: timeoutS !== undefined ? timeoutS * 1000 : envCfg.stepTimeoutMs
  };
  const runId = v('run-id') ?? env.RUN_ID ?? new Date().toISOString().replace(/[:.]/g, '-');

  return { input: merged, options, runId };
}

function printFailure(report: TrainingReport) {
  const failed = report.steps.find(s => !s.ok);
  if (!failed) return;
  console.error(COLOR.red(`\n[failed] ${failed.node}: ${failed.error?.message ?? 'step failed'}`));
  if (failed.output.trim().length > 0) console.error(preview(failed.output));
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let invocation: CliInvocation;
  try {
    const args = parseArgs(argv);
    if (args.bools.has('help')) {
      console.log(USAGE);
      return 0;
    }
    invocation = buildInvocation(args, env);
  } catch (e) {
    if (e instanceof UsageError || e instanceof ConfigurationError) {
      console.error(`[usage] ${e.message}\n${USAGE}`);
      return 2;
    }
    throw e;
  }

  let report: TrainingReport;
  try {
    report = await runResolved(resolveConfig(invocation.input), invocation.options);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(`[config] ${e.message}`);
      return 2;
    }
    throw e;
  }

  const outputDir = invocation.input.outputDir;
  if (typeof outputDir === 'string' && report.steps.length > 0) {
    const reportPath = writeReport(path.resolve(outputDir, 'logs'), invocation.runId, report);
    if (!QUIET) console.log(COLOR.gray(`[report] ${reportPath}`));
  }

  if (!report.success) {
    printFailure(report);
    return 1;
  }
  console.log(`\n[done] ${report.artifactPath ?? ''}`);
  return 0;
}

function isEntryPoint(): boolean {
  if (!process.argv[1]) return false;
  try {
    return fs.realpathSync(process.argv[1]) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then(code => { process.exitCode = code; })
    .catch(e => { console.error('[fatal]', e); process.exit(1); });
}
