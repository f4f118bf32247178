import { describe, it, expect } from 'vitest';
import { createGraph } from '../orchestrator/compiler.js';
import { plan } from '../orchestrator/planner.js';
import { executePlan, prepareRun, run } from '../orchestrator/run.js';
import { resolveConfig } from '../config.js';
import { EnvironmentError, StepExecutionError } from '../errors.js';
import type { StepRunner } from '../tools/cli/exec.js';
import type { BuildPlan } from '../types/contracts.js';
import { CWD, MemoryFs, OUT, WORK, baseInput, fakeRunner, graphDeps, mkNode } from './helpers.js';

function fourNodeGraph() {
  return createGraph([
    mkNode('groundtruth(doc1)', [], { outputs: [`${WORK}/eng.doc1.tif`] }),
    mkNode('box(doc1)', ['groundtruth(doc1)'], { kind: 'box', outputs: [`${WORK}/eng.doc1.box`] }),
    mkNode('lstmf(doc1)', ['groundtruth(doc1)', 'box(doc1)'], { kind: 'lstmf', outputs: [`${OUT}/eng.doc1.lstmf`] }),
    mkNode('combined(eng_custom)', ['lstmf(doc1)'], { kind: 'traineddata', outputs: [`${OUT}/eng_custom.traineddata`] })
  ]);
}

// Plan order; the font cache warm-up runs as soon as the first text is paired.
const FULL_ORDER = [
  'groundtruth(doc1)',
  'fontconfig(eng)',
  'box(doc1)',
  'lstmf(doc1)',
  'unicharset(eng)',
  'properties(eng)',
  'starter(eng)',
  'lstmflist(eng)',
  'checkpoint(eng_custom)',
  'traineddata(eng_custom)'
];

describe('executePlan', () => {
  it('runs a fresh four-node plan to completion', async () => {
    const fs = new MemoryFs();
    const g = fourNodeGraph();
    const p = await plan(g, 'combined(eng_custom)', { clock: fs });
    expect(p.steps.map(s => s.name)).toEqual(['groundtruth(doc1)', 'box(doc1)', 'lstmf(doc1)', 'combined(eng_custom)']);
    const { runner } = fakeRunner(fs);
    const results = await executePlan(p, runner);
    expect(results.map(r => r.ok)).toEqual([true, true, true, true]);
    expect((await plan(g, 'combined(eng_custom)', { clock: fs })).steps).toEqual([]);
  });

  it('stops at the first failure', async () => {
    const fs = new MemoryFs();
    const p = await plan(fourNodeGraph(), 'combined(eng_custom)', { clock: fs });
    const { runner, calls } = fakeRunner(fs, { 'lstmf(doc1)': 1 });
    const results = await executePlan(p, runner);
    expect(p.steps).toHaveLength(4);
    expect(results).toHaveLength(3);
    expect(results[2]).toMatchObject({ node: 'lstmf(doc1)', ok: false, exitCode: 1 });
    expect(calls).toEqual(['groundtruth(doc1)', 'box(doc1)', 'lstmf(doc1)']);
  });

  it('records a runner that throws as an environment failure', async () => {
    const runner: StepRunner = async () => {
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    };
    const p: BuildPlan = { targets: ['a'], steps: [mkNode('a')] };
    const [r] = await executePlan(p, runner);
    expect(r.ok).toBe(false);
    expect(r.error).toBeInstanceOf(EnvironmentError);
    expect(r.error?.message).toBe('Cannot start write for step a (EACCES)');
  });

  it('runs independent steps concurrently up to the limit', async () => {
    let active = 0;
    let peak = 0;
    const started: string[] = [];
    const runner: StepRunner = async node => {
      started.push(node.name);
      active++;
      peak = Math.max(peak, active);
      await new Promise(r => setTimeout(r, 5));
      active--;
      return { node: node.name, ok: true, exitCode: 0, output: '', durationMs: 5 };
    };
    const steps = [mkNode('a'), mkNode('b'), mkNode('c'), mkNode('d', ['a', 'b', 'c'])];
    const results = await executePlan({ targets: ['d'], steps }, runner, { maxParallel: 2 });
    expect(peak).toBe(2);
    expect(started.at(-1)).toBe('d');
    expect(results.map(r => r.node)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('falls back to one step at a time for a non-numeric limit', async () => {
    const fs = new MemoryFs();
    const { runner, calls } = fakeRunner(fs);
    const results = await executePlan({ targets: ['b'], steps: [mkNode('a'), mkNode('b', ['a'])] }, runner, {
      maxParallel: Number.NaN
    });
    expect(results.map(r => r.ok)).toEqual([true, true]);
    expect(calls).toEqual(['a', 'b']);
  });

  it('starts nothing new after a parallel failure and lets running steps finish', async () => {
    const started: string[] = [];
    const runner: StepRunner = async node => {
      started.push(node.name);
      if (node.name === 'a') {
        const error = new StepExecutionError('a', 'exit-code', 'exit code 2', 2);
        return { node: 'a', ok: false, exitCode: 2, output: '', durationMs: 0, error };
      }
      await new Promise(r => setTimeout(r, 5));
      return { node: node.name, ok: true, exitCode: 0, output: '', durationMs: 5 };
    };
    const steps = [mkNode('a'), mkNode('b'), mkNode('c', ['a']), mkNode('d', ['b'])];
    const results = await executePlan({ targets: ['c', 'd'], steps }, runner, { maxParallel: 2 });
    expect(started).toEqual(['a', 'b']);
    expect(results.map(r => [r.node, r.ok])).toEqual([
      ['a', false],
      ['b', true]
    ]);
  });
});

describe('run', () => {
  const options = (fs: MemoryFs, runner: StepRunner) => ({ cwd: CWD, fs, runner, graph: graphDeps });

  it('builds the model and reports its path', async () => {
    const fs = new MemoryFs();
    const { runner, calls } = fakeRunner(fs);
    const report = await run(baseInput(), options(fs, runner));
    expect(calls).toEqual(FULL_ORDER);
    expect(report).toMatchObject({
      success: true,
      plannedSteps: 10,
      failedStep: null,
      artifactPath: `${OUT}/eng_custom.traineddata`
    });
    expect(report.steps).toHaveLength(10);
  });

  it('reports the failed step and skips the rest', async () => {
    const fs = new MemoryFs();
    const { runner } = fakeRunner(fs, { 'lstmf(doc1)': 1 });
    const report = await run(baseInput(), options(fs, runner));
    expect(report).toMatchObject({ success: false, plannedSteps: 10, failedStep: 'lstmf(doc1)', artifactPath: null });
    expect(report.steps).toHaveLength(4);
    expect(report.steps[3].ok).toBe(false);
  });

  it('does nothing on a second run', async () => {
    const fs = new MemoryFs();
    fs.touch('/work/corpus/doc1.txt');
    await run(baseInput(), options(fs, fakeRunner(fs).runner));
    const again = fakeRunner(fs);
    const report = await run(baseInput(), options(fs, again.runner));
    expect(again.calls).toEqual([]);
    expect(report).toMatchObject({ success: true, plannedSteps: 0, steps: [], artifactPath: `${OUT}/eng_custom.traineddata` });
  });

  it('rebuilds everything after the ground-truth text changes', async () => {
    const fs = new MemoryFs();
    fs.touch('/work/corpus/doc1.txt');
    await run(baseInput(), options(fs, fakeRunner(fs).runner));
    fs.touch('/work/corpus/doc1.txt');
    const again = fakeRunner(fs);
    await run(baseInput(), options(fs, again.runner));
    expect(again.calls).toEqual(FULL_ORDER);
  });

  it('builds only the requested target', async () => {
    const fs = new MemoryFs();
    const { runner, calls } = fakeRunner(fs);
    const report = await run(baseInput(), { ...options(fs, runner), target: 'box(doc1)' });
    expect(calls).toEqual(['groundtruth(doc1)', 'fontconfig(eng)', 'box(doc1)']);
    expect(report.artifactPath).toBe(`${WORK}/eng.doc1.box`);
  });

  it('stops at the starter model and line list for line data only', async () => {
    const fs = new MemoryFs();
    const { runner, calls } = fakeRunner(fs);
    const report = await run(baseInput({ linedataOnly: true, training: {} }), options(fs, runner));
    expect(calls).toEqual(FULL_ORDER.slice(0, 8));
    expect(report.artifactPath).toBe(`${OUT}/eng.training_files.txt`);
  });

  it('copies box and tif files and empties the work directory except checkpoints', async () => {
    const fs = new MemoryFs();
    const { runner } = fakeRunner(fs);
    const report = await run(baseInput({ saveBoxTiff: true }), { ...options(fs, runner), cleanIntermediates: true });
    expect(report.success).toBe(true);
    expect(fs.files.has(`${OUT}/eng.doc1.box`)).toBe(true);
    expect(fs.files.has(`${OUT}/eng.doc1.tif`)).toBe(true);
    expect(fs.files.has(`${WORK}/eng.doc1.box`)).toBe(false);
    expect(fs.files.has(`${OUT}/eng.doc1.lstmf`)).toBe(true);
    expect(fs.files.has(`${WORK}/checkpoints/eng_custom_checkpoint`)).toBe(true);
  });

  it('fails the run when housekeeping fails', async () => {
    class ReadOnlyOutput extends MemoryFs {
      async copyFile(): Promise<void> {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      }
    }
    const fs = new ReadOnlyOutput();
    const report = await run(baseInput({ saveBoxTiff: true }), options(fs, fakeRunner(fs).runner));
    expect(report).toMatchObject({ success: false, failedStep: 'finish', artifactPath: null });
    expect(report.steps).toHaveLength(11);
    expect(report.steps[10].error?.message).toBe('Cannot start fs for step finish (EACCES)');
  });

  it('rejects an invalid configuration before running anything', async () => {
    const fs = new MemoryFs();
    const { runner, calls } = fakeRunner(fs);
    await expect(run(baseInput({ langCode: 'xyz_fake' }), options(fs, runner))).rejects.toMatchObject({
      code: 'UNKNOWN_LANGUAGE'
    });
    expect(calls).toEqual([]);
  });

  it('prepares a plan without executing it', async () => {
    const prepared = await prepareRun(resolveConfig(baseInput(), CWD), { fs: new MemoryFs(), graph: graphDeps });
    expect(prepared.plan.steps.map(s => s.name)).toEqual(FULL_ORDER);
    expect(prepared.graph.order).toHaveLength(FULL_ORDER.length);
  });
});
