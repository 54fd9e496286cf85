/**
 * list-sent-messages Tool
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ExportConfig } from "../config.js";
import { MAX_PAGE_SIZE } from "../constants.js";
import { listResource } from "./list-resource.js";

export function registerListSentMessages(
  server: McpServer,
  config: ExportConfig
): void {
  server.registerTool(
    "list-sent-messages",
    {
      title: "List Sent Messages",
      description:
        "List messages in the Sent Items folder with recipients, sent time and body preview.",
      inputSchema: {
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
    async ({ top }) => listResource(config, "sent", { top })
  );
}
