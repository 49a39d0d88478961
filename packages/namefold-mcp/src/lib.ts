export { decodeNameBytes, assembleScalar, sequenceLength, type DecodedToken } from "./sanitize/utf8_decoder.js";
export { foldScalar, isCombiningMark, type FoldAction } from "./sanitize/fold_table.js";
export { classifyAsciiByte, type AsciiClass } from "./sanitize/ascii_policy.js";
export { cleanName, cleanNameText, needsRename, COLLAPSE_CHAR } from "./sanitize/clean_name.js";
export { applyRename, cleanPath, type CleanedPath, type RenameOptions } from "./fs/rename.js";
export { walkDirectory, type WalkOptions } from "./fs/walker.js";
export { runPaths, dedupeRoots, type RunPathsOptions } from "./run.js";
export { renderText, renderJson, renderCsv, summarize, toRecord } from "./report/render.js";
export { parseReport, fromRecord } from "./report/parse.js";
export { StepLogger, normalizeError } from "./logger.js";
export { cfgFromEnv, type AppConfig } from "./config.js";
export * from "./types.js";
export { createServer } from "./server.js";
