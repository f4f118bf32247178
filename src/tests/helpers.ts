import type { TrainingConfigInput } from '../config.js';
import { StepExecutionError } from '../errors.js';
import type { GraphDeps } from '../orchestrator/graph.js';
import type { StepRunner } from '../tools/cli/exec.js';
import type { ArtifactKind, ArtifactNode, NodeName } from '../types/contracts.js';
import type { ArtifactFs, ToolResolver } from '../types/tools.js';

export const CWD = '/work';
export const OUT = '/work/out';
export const WORK = '/work/out/.work';

/** In-memory artifact store with a monotonically increasing clock. */
export class MemoryFs implements ArtifactFs {
  readonly files = new Map<string, { mtime: number; contents: string }>();
  readonly dirs = new Set<string>();
  private clock = 1_000;

  touch(path: string, contents = '') {
    this.clock += 10;
    this.files.set(path, { mtime: this.clock, contents });
  }

  setMtime(path: string, mtime: number) {
    this.files.set(path, { mtime, contents: this.files.get(path)?.contents ?? '' });
  }

  async mtimeMs(path: string) {
    return this.files.get(path)?.mtime;
  }

  async mkdirp(dir: string) {
    this.dirs.add(dir);
  }

  async writeFile(path: string, contents: string) {
    this.touch(path, contents);
  }

  async copyFile(from: string, to: string) {
    const src = this.files.get(from);
    if (!src) throw Object.assign(new Error(`ENOENT: no such file ${from}`), { code: 'ENOENT' });
    this.touch(to, src.contents);
  }

  async listDir(dir: string) {
    const names = new Set<string>();
    for (const path of this.files.keys()) {
      if (path.startsWith(`${dir}/`)) names.add(path.slice(dir.length + 1).split('/')[0]);
    }
    return [...names];
  }

  async remove(target: string) {
    for (const path of [...this.files.keys()]) {
      if (path === target || path.startsWith(`${target}/`)) this.files.delete(path);
    }
  }
}

export const fakeResolver: ToolResolver = program => `/opt/tesseract/bin/${program}`;

export const graphDeps: GraphDeps = {
  resolver: fakeResolver,
  searchDirs: [],
  isReadableFile: path => path.endsWith('.txt')
};

export function baseInput(overrides: Partial<TrainingConfigInput> = {}): TrainingConfigInput {
  return {
    langCode: 'eng',
    modelName: 'eng_custom',
    documents: [{ id: 'doc1', font: 'FontA', text: 'corpus/doc1.txt' }],
    outputDir: 'out',
    langdataDir: 'langdata',
    tessdataDir: 'tessdata',
    training: { netSpec: '[1,36,0,1 Ct3,3,16 Mp3,3 Lfys48 Lfx96 Lrx96 Lfx256 O1c111]' },
    ...overrides
  };
}

/** Pretends every step writes its outputs; steps named in `failing` exit with the given code. */
export function fakeRunner(fs: MemoryFs, failing: Record<NodeName, number> = {}) {
  const calls: NodeName[] = [];
  const runner: StepRunner = async node => {
    calls.push(node.name);
    const code = failing[node.name];
    if (code !== undefined) {
      const error = new StepExecutionError(node.name, 'exit-code', `exit code ${code}`, code);
      return { node: node.name, ok: false, exitCode: code, output: 'tool output', durationMs: 0, error };
    }
    for (const out of node.outputs) fs.touch(out);
    return { node: node.name, ok: true, exitCode: 0, output: '', durationMs: 0 };
  };
  return { runner, calls };
}

export function mkNode(
  name: NodeName,
  dependencies: NodeName[] = [],
  extra: { kind?: ArtifactKind; outputs?: string[]; sources?: string[] } = {}
): ArtifactNode {
  return {
    name,
    kind: extra.kind ?? 'groundtruth',
    outputs: extra.outputs ?? [`/art/${name}.out`],
    dependencies,
    sources: extra.sources ?? [],
    action: { type: 'write', contents: name },
    params: {}
  };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected the call to throw');
}
