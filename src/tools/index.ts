/**
 * MCP Tools Registration
 *
 * Registers the mailbox retrieval and export tools with the MCP server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ExportConfig } from "../config.js";
import { registerListInboxMessages } from "./list-inbox-messages.js";
import { registerListSentMessages } from "./list-sent-messages.js";
import { registerListCalendarEvents } from "./list-calendar-events.js";
import { registerExportMailbox } from "./export-mailbox.js";

export function registerTools(server: McpServer, config: ExportConfig): void {
  // Retrieval tools
  registerListInboxMessages(server, config);
  registerListSentMessages(server, config);
  registerListCalendarEvents(server, config);

  // Export
  registerExportMailbox(server, config);
}
