import fs from "node:fs/promises";

import type { StepLogger } from "../logger.js";
import { READ_DIR_ERROR, type PathChange } from "../types.js";
import { mapPool } from "../util/pool.js";
import { cleanPath } from "./rename.js";
import { displayPath, joinRawPath } from "./raw_path.js";

export type WalkOptions = {
  dryRun: boolean;
  concurrency: number;
  logger?: StepLogger;
};

/**
 * Renames `root`, then everything below it, depth first. The directory is
 * listed under its new name when it was renamed.
 */
export async function walkDirectory(root: Buffer, options: WalkOptions): Promise<PathChange[]> {
  const self = await cleanPath(root, options);
  const results: PathChange[] = [self.change];
  const dir = self.current;

  let names: Buffer[];
  try {
    names = await fs.readdir(dir, { encoding: "buffer" });
  } catch (err) {
    options.logger?.failure("readdir", err, displayPath(dir));
    results.push({ kind: "error", path: displayPath(dir), error: READ_DIR_ERROR });
    return results;
  }

  const nested = await mapPool(names, options.concurrency, async (name) => {
    const child = joinRawPath(dir, name);
    if (await isDirectoryEntry(child)) {
      return walkDirectory(child, options);
    }
    const cleaned = await cleanPath(child, options);
    return [cleaned.change];
  });
  for (const changes of nested) {
    results.push(...changes);
  }
  return results;
}

// lstat: a symlink to a directory is renamed, never descended into
async function isDirectoryEntry(raw: Buffer): Promise<boolean> {
  try {
    const stat = await fs.lstat(raw);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
