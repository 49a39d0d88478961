import fs from "node:fs/promises";

import { cleanPath } from "./fs/rename.js";
import { normalizeRawPath, toRawPath } from "./fs/raw_path.js";
import { walkDirectory } from "./fs/walker.js";
import type { StepLogger } from "./logger.js";
import type { PathChange, RunOptions } from "./types.js";
import { mapPool } from "./util/pool.js";

export type RunPathsOptions = RunOptions & {
  logger?: StepLogger;
  onRoot?: (root: string) => void;
};

/**
 * Sanitizes every given path: directories are walked, anything else is
 * renamed on its own. Roots must not overlap when `concurrency` > 1.
 */
export async function runPaths(paths: Iterable<string | Buffer>, options: RunPathsOptions): Promise<PathChange[]> {
  const roots = dedupeRoots(paths);
  const perRoot = await mapPool(roots, options.concurrency, async (root) => {
    const shown = root.toString("utf8");
    options.onRoot?.(shown);
    const visit = async (): Promise<PathChange[]> => {
      if (await isDirectory(root)) {
        return walkDirectory(root, options);
      }
      const cleaned = await cleanPath(root, options);
      return [cleaned.change];
    };
    return options.logger ? options.logger.step("root", visit, shown) : visit();
  });
  return perRoot.flat();
}

export function dedupeRoots(paths: Iterable<string | Buffer>): Buffer[] {
  const seen = new Set<string>();
  const roots: Buffer[] = [];
  for (const p of paths) {
    const raw = toRawPath(p);
    const key = normalizeRawPath(raw).toString("hex");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    roots.push(raw);
  }
  return roots;
}

async function isDirectory(raw: Buffer): Promise<boolean> {
  try {
    return (await fs.stat(raw)).isDirectory();
  } catch {
    return false;
  }
}
