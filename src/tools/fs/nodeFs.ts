import { copyFile, mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import type { ArtifactFs } from "../../types/tools.js";

export function errorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export const nodeFs: ArtifactFs = {
  async mtimeMs(path) {
    try {
      return (await stat(path)).mtimeMs;
    } catch (e) {
      const code = errorCode(e);
      if (code === "ENOENT" || code === "ENOTDIR") return undefined;
      throw e;
    }
  },
  async mkdirp(dir) {
    await mkdir(dir, { recursive: true });
  },
  async writeFile(path, contents) {
    await writeFile(path, contents, { encoding: "utf-8" });
  },
  async copyFile(from, to) {
    await copyFile(from, to);
  },
  async listDir(dir) {
    try {
      return await readdir(dir);
    } catch (e) {
      if (errorCode(e) === "ENOENT") return [];
      throw e;
    }
  },
  async remove(path) {
    await rm(path, { recursive: true, force: true });
  }
};
