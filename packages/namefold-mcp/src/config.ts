import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

export const APP_NAME = "namefold";
export const APP_VERSION = "0.1.0";

const MAX_CONCURRENCY = 64;

export type AppConfig = {
  dryRun: boolean;
  concurrency: number;
  logDir?: string;
};

export function cfgFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dryRun = (env.NAMEFOLD_DRY_RUN || "true").toLowerCase() === "true";
  return {
    dryRun,
    concurrency: clampConcurrency(env.NAMEFOLD_CONCURRENCY ? Number(env.NAMEFOLD_CONCURRENCY) : 4),
    logDir: env.NAMEFOLD_LOG_DIR ? resolvePath(process.cwd(), env.NAMEFOLD_LOG_DIR) : undefined
  };
}

export function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) {
    return 1;
  }
  return Math.max(1, Math.min(MAX_CONCURRENCY, Math.floor(value)));
}

export function resolvePath(baseDir: string, maybeRelative: string): string {
  if (path.isAbsolute(maybeRelative)) {
    return maybeRelative;
  }
  return path.resolve(baseDir, maybeRelative);
}
