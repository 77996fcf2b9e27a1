import { existsSync } from "node:fs";
import path from "node:path";

const ROOT_MARKERS = [".git", "package-lock.json"];

export function findRepoRoot(startDirectory: string): string {
  let currentDir = path.resolve(startDirectory);
  while (true) {
    if (ROOT_MARKERS.some((marker) => existsSync(path.join(currentDir, marker)))) {
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return path.resolve(startDirectory);
    }
    currentDir = parentDir;
  }
}

/** Explicit paths are relative to the cwd, defaults to the repository root. */
export function resolveUserPath(value: string | undefined, fallback: string, cwd: string, repoRoot: string): string {
  if (value) {
    return path.resolve(cwd, value);
  }
  return path.resolve(repoRoot, fallback);
}
