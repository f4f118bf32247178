import { accessSync, constants, statSync } from "node:fs";
import { delimiter, join } from "node:path";
import type { ToolRegistry, ToolResolver } from "../types/tools.js";
import { ConfigurationError } from "../errors.js";

// Build trees place the training tools under these subdirectories.
const TOOL_PREFIXES = ["", "api/", "training/"];

function isExecutable(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export const findOnPath: ToolResolver = (program, searchDirs) => {
  const names = process.platform === "win32" ? [program, `${program}.exe`] : [program];
  for (const dir of searchDirs) {
    for (const prefix of TOOL_PREFIXES) {
      for (const name of names) {
        const candidate = join(dir, prefix, name);
        if (isExecutable(candidate)) return candidate;
      }
    }
  }
  return undefined;
};

export function toolSearchDirs(toolDir: string | undefined, env: NodeJS.ProcessEnv = process.env): string[] {
  const fromPath = (env.PATH ?? "").split(delimiter).filter(d => d.length > 0);
  return toolDir ? [toolDir, ...fromPath] : fromPath;
}

/**
 * Resolves every program once, up front. A missing tool is a configuration
 * problem, so nothing gets spawned when one is absent.
 */
export function buildToolRegistry(
  programs: Iterable<string>,
  searchDirs: readonly string[],
  resolver: ToolResolver = findOnPath
): ToolRegistry {
  const registry: Record<string, string> = {};
  const missing: string[] = [];
  for (const program of programs) {
    if (program in registry || missing.includes(program)) continue;
    const found = resolver(program, searchDirs);
    if (found) registry[program] = found;
    else missing.push(program);
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Required tool(s) not found: ${missing.join(", ")}`, "TOOL_NOT_FOUND");
  }
  return registry;
}
