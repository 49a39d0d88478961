import fs from "node:fs";

import { APP_NAME, APP_VERSION, clampConcurrency, resolvePath, type AppConfig } from "../config.js";
import { joinRawPath } from "../fs/raw_path.js";

export type OutputMode =
  | { kind: "default" }
  | { kind: "quiet" }
  | { kind: "json"; onlyErrors: boolean; pretty: boolean }
  | { kind: "csv"; onlyErrors: boolean };

export type CliOptions = {
  dryRun: boolean;
  output: OutputMode;
  concurrency: number;
  logDir?: string;
};

export type ParsedArgs =
  | { kind: "run"; options: CliOptions; paths: Array<string | Buffer>; notices: string[] }
  | { kind: "exit"; code: number; text: string };

export const HELP_TEXT = [
  `Usage: ${APP_NAME} [options] [path]`,
  versionLine(),
  "Options:",
  "  -d, --do          Do the renaming",
  "  -h, --help        Show this help message",
  "  -v, --version     Show the version",
  "  -p, --json-pretty Print the result in JSON format (pretty)",
  "  -e, --json-error  Print only the errors in JSON format",
  "  -j, --json        Print the result in JSON format",
  "  -c, --csv         Print the result in CSV format",
  "  -q, --quiet       Do not print anything",
  "      --jobs <n>    Number of paths processed in parallel",
  "      --log-dir <d> Write a step log to this directory"
].join("\n");

export function versionLine(): string {
  return `${APP_NAME} ${APP_VERSION}`;
}

export function isVerbose(output: OutputMode): boolean {
  return output.kind === "default";
}

function onlyErrorsOf(output: OutputMode): boolean {
  return output.kind === "json" || output.kind === "csv" ? output.onlyErrors : false;
}

/** Entries of `dir` as raw paths, so names that are not valid UTF-8 survive. */
export function listDirPaths(dir: string): Buffer[] {
  const rawDir = Buffer.from(dir, "utf8");
  try {
    return fs.readdirSync(dir, { encoding: "buffer" }).map((name) => joinRawPath(rawDir, name));
  } catch {
    return [];
  }
}

export function parseArgs(argv: readonly string[], cfg: AppConfig): ParsedArgs {
  let dryRun = cfg.dryRun;
  let output: OutputMode = { kind: "default" };
  let concurrency = cfg.concurrency;
  let logDir = cfg.logDir;
  const paths: Array<string | Buffer> = [];
  const notices: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-d":
      case "--do":
        dryRun = false;
        break;
      case "-h":
      case "--help":
        return { kind: "exit", code: 1, text: HELP_TEXT };
      case "-v":
      case "--version":
        return { kind: "exit", code: 1, text: versionLine() };
      case "-p":
      case "--json-pretty":
        output = { kind: "json", onlyErrors: output.kind === "json" ? output.onlyErrors : false, pretty: true };
        break;
      case "-e":
      case "--json-error":
        output =
          output.kind === "csv"
            ? { kind: "csv", onlyErrors: true }
            : { kind: "json", onlyErrors: true, pretty: output.kind === "json" ? output.pretty : false };
        break;
      case "-j":
      case "--json":
        output = { kind: "json", onlyErrors: false, pretty: output.kind === "json" ? output.pretty : false };
        break;
      case "-c":
      case "--csv":
        output = { kind: "csv", onlyErrors: onlyErrorsOf(output) };
        break;
      case "-q":
      case "--quiet":
        output = { kind: "quiet" };
        break;
      case "--jobs": {
        const value = Number(argv[i + 1]);
        if (!Number.isInteger(value) || value < 1) {
          return { kind: "exit", code: 2, text: `Invalid value for --jobs: ${argv[i + 1] ?? ""}` };
        }
        concurrency = clampConcurrency(value);
        i += 1;
        break;
      }
      case "--log-dir": {
        const value = argv[i + 1];
        if (!value) {
          return { kind: "exit", code: 2, text: "Missing value for --log-dir" };
        }
        logDir = resolvePath(process.cwd(), value);
        i += 1;
        break;
      }
      case "*":
        // only reached when the shell did not expand the glob
        paths.push(...listDirPaths("."));
        break;
      default:
        if (fs.existsSync(arg)) {
          paths.push(arg);
        } else if (isVerbose(output)) {
          notices.push(`Cannot find path: ${arg}`);
        }
    }
  }

  if (!paths.length) {
    paths.push(...listDirPaths("."));
  }
  return { kind: "run", options: { dryRun, output, concurrency, logDir }, paths, notices };
}
