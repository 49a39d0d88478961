export type PathChange =
  | { kind: "unchanged"; path: string }
  | { kind: "changed"; path: string; modified: string }
  | { kind: "error_rename"; path: string; modified: string; error: string }
  | { kind: "error"; path: string; error: string };

export type PathChangeKind = PathChange["kind"];

/** Wire shape of a PathChange, shared by the JSON and CSV reports. */
export type PathChangeRecord = {
  path: string;
  modified: string | null;
  error: string | null;
};

export type RunOptions = {
  dryRun: boolean;
  concurrency: number;
};

export const DRY_RUN_REASON = "dry-run";
export const READ_DIR_ERROR = "Error while reading directory";

export function isDryRunPreview(change: PathChange): boolean {
  return change.kind === "error_rename" && change.error === DRY_RUN_REASON;
}

export function isFailure(change: PathChange): boolean {
  return change.kind === "error" || change.kind === "error_rename";
}
