/**
 * export-mailbox Tool
 *
 * Run the full export (authenticate, fetch inbox/sent/calendar, write the
 * bundle) and report the per-collection totals.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ExportConfig } from "../config.js";
import { runExport } from "../pipeline.js";
import { OutlookAuthError } from "../outlook/types.js";
import { authFailure, toolError, toolJsonSuccess } from "./helpers.js";

export function registerExportMailbox(
  server: McpServer,
  config: ExportConfig
): void {
  server.registerTool(
    "export-mailbox",
    {
      title: "Export Mailbox",
      description:
        "Export inbox messages, sent messages and calendar events to a JSON file. Overwrites the file if it exists.",
      inputSchema: {
        outputPath: z
          .string()
          .min(1)
          .optional()
          .describe("Destination file (defaults to the configured output path)"),
        keyword: z
          .string()
          .optional()
          .describe("Inbox subject keyword filter"),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ outputPath, keyword }) => {
      const report = await runExport({
        ...config,
        outputPath: outputPath ?? config.outputPath,
        keyword: keyword ?? config.keyword,
      });

      if (report.status === "exported") {
        return toolJsonSuccess({
          outputPath: report.outputPath,
          totalItems: report.totals,
        });
      }

      if (report.error instanceof OutlookAuthError) {
        throw authFailure(report.error);
      }

      return toolError(
        `Export failed at step "${report.step}": ${report.error.message}`
      );
    }
  );
}
