import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { APP_VERSION, clampConcurrency, type AppConfig } from "./config.js";
import { StepLogger, normalizeError } from "./logger.js";
import { renderJson, summarize } from "./report/render.js";
import { runPaths } from "./run.js";
import { cleanNameText } from "./sanitize/clean_name.js";

export function createServer(cfg: AppConfig): McpServer {
  const server = new McpServer({ name: "namefold-mcp", version: APP_VERSION });

  server.tool(
    "clean_name",
    {
      name: z.string().min(1).describe("A single file or directory name, without separators")
    },
    async ({ name }) => {
      const cleaned = cleanNameText(name);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ name, cleaned, changed: cleaned !== name })
          }
        ]
      };
    }
  );

  server.tool(
    "clean_paths",
    {
      paths: z.array(z.string()).min(1).describe("Files or directories; directories are walked recursively"),
      dryRun: z.boolean().optional().describe("Preview only; defaults to NAMEFOLD_DRY_RUN"),
      onlyErrors: z.boolean().default(false),
      concurrency: z.number().int().min(1).optional()
    },
    async (args) => {
      const logger = cfg.logDir ? new StepLogger(cfg.logDir) : undefined;
      try {
        const changes = await runPaths(args.paths, {
          dryRun: args.dryRun ?? cfg.dryRun,
          concurrency: clampConcurrency(args.concurrency ?? cfg.concurrency),
          logger
        });
        const summary = summarize(changes);
        logger?.finalize("success", undefined, summary);
        const failed = summary.error + summary.error_rename - summary.dry_run;
        return {
          content: [
            {
              type: "text",
              text: `Checked ${summary.total} path(s): ${summary.changed} renamed, ${summary.dry_run} pending (dry-run), ${failed} failed.`
            },
            {
              type: "text",
              text: renderJson(changes, { onlyErrors: args.onlyErrors, pretty: true })
            }
          ]
        };
      } catch (err) {
        logger?.finalize("error", err);
        const errMeta = normalizeError(err);
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: `Failed. ${errMeta.code}: ${errMeta.message}`
            }
          ]
        };
      }
    }
  );

  return server;
}
