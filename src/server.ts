/**
 * MCP Server
 *
 * Exposes mailbox retrieval and export as Model Context Protocol tools over
 * stdio. All logging goes to stderr to avoid corrupting JSON-RPC over
 * stdout.
 *
 * @see https://modelcontextprotocol.io/
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { ExportConfig } from "./config.js";
import { APP_NAME } from "./constants.js";
import { registerTools } from "./tools/index.js";

export function createServer(config: ExportConfig, version: string): McpServer {
  const server = new McpServer(
    { name: APP_NAME, version },
    {
      instructions:
        "Outlook server providing tools for listing inbox messages, sent " +
        "messages and calendar events, and for exporting them to a JSON " +
        "file, via Microsoft Graph API.",
    }
  );

  registerTools(server, config);

  return server;
}

export async function startStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();

  process.on("SIGTERM", () => {
    void server.close();
  });
  process.on("SIGINT", () => {
    void server.close();
  });

  await server.connect(transport);
  console.error(`[${APP_NAME}] Server running on stdio transport`);
}
