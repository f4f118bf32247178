export interface LaunchRequest {
  program: string;
  args: readonly string[];
  cwd: string;
  env?: Readonly<Record<string, string>>;
  timeoutMs?: number;
}

export interface LaunchResult {
  exitCode: number | null;
  output: string; // stdout and stderr interleaved
  timedOut: boolean;
}

/**
 * Spawns one external process and resolves once it exits. Rejects only when the
 * process could not be started at all (the rejection carries a `code` such as
 * ENOENT or EACCES).
 */
export type ProcessLauncher = (req: LaunchRequest) => Promise<LaunchResult>;

/** Resolves a program name to an executable path, or undefined when absent. */
export type ToolResolver = (program: string, searchDirs: readonly string[]) => string | undefined;

/** Program name -> resolved executable path. */
export type ToolRegistry = Readonly<Record<string, string>>;

export interface FileClock {
  /** Modification time in ms, or undefined when the file does not exist. */
  mtimeMs(path: string): Promise<number | undefined>;
}

/** The filesystem operations the pipeline performs on artifacts. */
export interface ArtifactFs extends FileClock {
  mkdirp(dir: string): Promise<void>;
  writeFile(path: string, contents: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  /** Entry names directly under `dir`; empty when it does not exist. */
  listDir(dir: string): Promise<string[]>;
  /** Removes a file or a directory tree; absent paths are ignored. */
  remove(path: string): Promise<void>;
}
