/**
 * list-inbox-messages Tool
 *
 * List messages in the mailbox, optionally filtered by a subject keyword.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ExportConfig } from "../config.js";
import { MAX_PAGE_SIZE } from "../constants.js";
import { listResource } from "./list-resource.js";

export function registerListInboxMessages(
  server: McpServer,
  config: ExportConfig
): void {
  server.registerTool(
    "list-inbox-messages",
    {
      title: "List Inbox Messages",
      description:
        "List mailbox messages with sender, recipients, received time and body preview. Pass a keyword to keep only messages whose subject contains it.",
      inputSchema: {
        keyword: z
          .string()
          .optional()
          .describe("Subject keyword filter (defaults to the configured keyword)"),
        top: z
          .number()
          .int()
          .min(1)
          .max(MAX_PAGE_SIZE)
          .optional()
          .describe("Return a single page of at most this many messages"),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ keyword, top }) => listResource(config, "inbox", { keyword, top })
  );
}
