/**
 * list-calendar-events Tool
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ExportConfig } from "../config.js";
import { MAX_PAGE_SIZE } from "../constants.js";
import { listResource } from "./list-resource.js";

export function registerListCalendarEvents(
  server: McpServer,
  config: ExportConfig
): void {
  server.registerTool(
    "list-calendar-events",
    {
      title: "List Calendar Events",
      description:
        "List calendar events with start, end, location, organizer and attendees.",
      inputSchema: {
        top: z
          .number()
          .int()
          .min(1)
          .max(MAX_PAGE_SIZE)
          .optional()
          .describe("Return a single page of at most this many events"),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ top }) => listResource(config, "calendar", { top })
  );
}
