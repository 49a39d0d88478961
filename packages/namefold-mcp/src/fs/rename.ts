import fs from "node:fs/promises";

import { normalizeError, type StepLogger } from "../logger.js";
import { cleanName } from "../sanitize/clean_name.js";
import { DRY_RUN_REASON, type PathChange } from "../types.js";
import { displayPath, fileNameOf, withFileName } from "./raw_path.js";

export type RenameOptions = {
  dryRun: boolean;
  logger?: StepLogger;
};

export type CleanedPath = {
  change: PathChange;
  /** Where the entry lives after this call. */
  current: Buffer;
};

export async function applyRename(rawPath: Buffer, cleaned: Uint8Array, options: RenameOptions): Promise<PathChange> {
  return (await renameTo(rawPath, cleaned, options)).change;
}

export async function cleanPath(rawPath: Buffer, options: RenameOptions): Promise<CleanedPath> {
  const name = fileNameOf(rawPath);
  if (name === null) {
    return { change: { kind: "unchanged", path: displayPath(rawPath) }, current: rawPath };
  }
  return renameTo(rawPath, cleanName(name), options);
}

async function renameTo(rawPath: Buffer, cleaned: Uint8Array, options: RenameOptions): Promise<CleanedPath> {
  const shown = displayPath(rawPath);
  const name = fileNameOf(rawPath);
  if (name === null || name.equals(cleaned)) {
    return { change: { kind: "unchanged", path: shown }, current: rawPath };
  }
  const target = withFileName(rawPath, cleaned);
  const modified = displayPath(target);
  if (options.dryRun) {
    return { change: { kind: "error_rename", path: shown, modified, error: DRY_RUN_REASON }, current: rawPath };
  }
  try {
    await fs.rename(rawPath, target);
  } catch (err) {
    options.logger?.failure("rename", err, shown);
    return {
      change: { kind: "error_rename", path: shown, modified, error: normalizeError(err).message },
      current: rawPath
    };
  }
  options.logger?.info("rename", { modified }, shown);
  return { change: { kind: "changed", path: shown, modified }, current: target };
}
