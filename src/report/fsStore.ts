import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export function saveRunFile(logRoot: string, runId: string, fileName: string, content: string) {
  const dir = join(logRoot, runId);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, "utf-8");
  return path;
}
