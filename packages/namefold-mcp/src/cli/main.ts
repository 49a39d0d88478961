import { cfgFromEnv } from "../config.js";
import { StepLogger, normalizeError } from "../logger.js";
import { renderCsv, renderJson, renderText, summarize } from "../report/render.js";
import { runPaths } from "../run.js";
import type { PathChange } from "../types.js";
import { isVerbose, parseArgs, type OutputMode } from "./args.js";

export type CliIo = {
  out: (text: string) => void;
};

const consoleIo: CliIo = { out: (text) => console.log(text) };

export function renderOutput(output: OutputMode, changes: readonly PathChange[]): string | null {
  switch (output.kind) {
    case "default":
      return renderText(changes);
    case "quiet":
      return null;
    case "json":
      return renderJson(changes, output);
    case "csv":
      return renderCsv(changes, output).replace(/\n$/, "");
  }
}

/** Runs the command line and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = consoleIo): Promise<number> {
  const parsed = parseArgs(argv, cfgFromEnv());
  if (parsed.kind === "exit") {
    io.out(parsed.text);
    return parsed.code;
  }

  const { options, paths, notices } = parsed;
  // recorded only while the output was still verbose
  notices.forEach((line) => io.out(line));
  const verbose = isVerbose(options.output);
  if (verbose) {
    io.out(`Running with options: { dry_run: ${options.dryRun} }`);
  }

  const logger = options.logDir ? new StepLogger(options.logDir) : undefined;
  logger?.info("args", { dry_run: options.dryRun, concurrency: options.concurrency, roots: paths.length });
  const changes = await runPaths(paths, {
    dryRun: options.dryRun,
    concurrency: options.concurrency,
    logger,
    onRoot: verbose ? (root) => io.out(`Checking: ${root}`) : undefined
  });

  let text: string | null;
  try {
    text = renderOutput(options.output, changes);
  } catch (err) {
    logger?.finalize("error", err, summarize(changes));
    io.out(`{"error": "Cannot serialize result", "message": ${JSON.stringify(normalizeError(err).message)}}`);
    return 2;
  }
  logger?.finalize("success", undefined, summarize(changes));
  if (text !== null) {
    io.out(text);
  }
  return 0;
}
