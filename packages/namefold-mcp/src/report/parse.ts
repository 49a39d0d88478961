import { z } from "zod";

import type { PathChange, PathChangeRecord } from "../types.js";

const recordSchema = z.object({
  path: z.string(),
  modified: z.string().nullable().default(null),
  error: z.string().nullable().default(null)
});

const reportSchema = z.array(recordSchema);

export function fromRecord(record: PathChangeRecord): PathChange {
  const { path, modified, error } = record;
  if (modified === null && error === null) {
    return { kind: "unchanged", path };
  }
  if (modified !== null && error === null) {
    return { kind: "changed", path, modified };
  }
  if (modified !== null && error !== null) {
    return { kind: "error_rename", path, modified, error };
  }
  return { kind: "error", path, error: error ?? "" };
}

/** Reads a JSON report back; throws a ZodError on malformed input. */
export function parseReport(json: string): PathChange[] {
  const records = reportSchema.parse(JSON.parse(json));
  return records.map(fromRecord);
}
