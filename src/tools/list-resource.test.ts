import { describe, it, expect, vi, beforeEach } from "vitest";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ExportConfig } from "../config.js";
import { OutlookClient } from "../outlook/client.js";
import { fetchPage } from "../outlook/pagination.js";
import { fetchResource } from "../outlook/retrieve.js";
import { acquireToken } from "../outlook/token.js";
import { OutlookAuthError, OutlookClientError } from "../outlook/types.js";
import { INBOX_SELECT_FIELDS } from "../constants.js";
import { registerListCalendarEvents } from "./list-calendar-events.js";
import { registerListInboxMessages } from "./list-inbox-messages.js";
import { registerListSentMessages } from "./list-sent-messages.js";

vi.mock("../outlook/token.js", () => ({
  acquireToken: vi.fn(),
}));

vi.mock("../outlook/pagination.js", () => ({
  fetchPage: vi.fn(),
}));

vi.mock("../outlook/retrieve.js", () => ({
  fetchResource: vi.fn(),
}));

type ToolCallback = (args: Record<string, unknown>) => Promise<CallToolResult>;

const token = {
  value: "test-token",
  acquiredAt: "2026-03-01T12:00:00.000Z",
  grantType: "password" as const,
};

const config: ExportConfig = {
  credentials: {
    tenantId: "tenant-id",
    clientId: "client-id",
    username: "user@example.test",
    password: "test-password",
  },
  keyword: "wisp",
  outputPath: "outlook_data.json",
  pageSize: 50,
  maxPages: 10,
  timeoutMs: 5000,
  concurrent: false,
  authorityBaseUrl: "https://login.microsoftonline.com",
  graphBaseUrl: "https://graph.microsoft.com/v1.0",
  scopes: ["https://graph.microsoft.com/.default"],
};

function firstText(result: CallToolResult): string {
  const item = result.content[0];
  if (item?.type !== "text") {
    throw new Error("Expected text content");
  }
  return item.text;
}

describe("list tools", () => {
  const mockRegisterTool = vi.fn();
  const server = { registerTool: mockRegisterTool } as unknown as McpServer;

  function toolCallback(): ToolCallback {
    return mockRegisterTool.mock.calls[0]![2] as ToolCallback;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(acquireToken).mockResolvedValue({ success: true, data: token });
  });

  it("registers with the expected names", () => {
    registerListInboxMessages(server, config);
    registerListSentMessages(server, config);
    registerListCalendarEvents(server, config);

    expect(mockRegisterTool.mock.calls.map((call: unknown[]) => call[0])).toEqual([
      "list-inbox-messages",
      "list-sent-messages",
      "list-calendar-events",
    ]);
  });

  it("uses fetchPage when top is specified", async () => {
    const messages = [{ id: "m1", subject: "wisp" }];
    vi.mocked(fetchPage).mockResolvedValue({
      success: true,
      data: { value: messages },
    });
    registerListInboxMessages(server, config);

    const result = await toolCallback()({ top: 5 });

    expect(fetchPage).toHaveBeenCalledTimes(1);
    const [client, path, params] = vi.mocked(fetchPage).mock.calls[0]!;
    expect(client).toBeInstanceOf(OutlookClient);
    expect(path).toBe("/me/messages");
    expect(params).toEqual({
      $select: INBOX_SELECT_FIELDS,
      $top: "5",
      $filter: "contains(subject,'wisp')",
    });
    expect(fetchResource).not.toHaveBeenCalled();
    expect(JSON.parse(firstText(result))).toEqual(messages);
  });

  it("uses fetchResource when top is not specified", async () => {
    const events = [{ id: "e1" }, { id: "e2" }];
    vi.mocked(fetchResource).mockResolvedValue({ success: true, data: events });
    registerListCalendarEvents(server, config);

    const result = await toolCallback()({});

    expect(fetchResource).toHaveBeenCalledWith("calendar", token, {
      mailboxUser: undefined,
      keyword: "wisp",
      pageSize: 50,
      maxPages: 10,
      baseUrl: "https://graph.microsoft.com/v1.0",
      timeoutMs: 5000,
    });
    expect(fetchPage).not.toHaveBeenCalled();
    expect(JSON.parse(firstText(result))).toEqual(events);
  });

  it("lets the keyword argument replace the configured keyword", async () => {
    vi.mocked(fetchResource).mockResolvedValue({ success: true, data: [] });
    registerListInboxMessages(server, config);

    await toolCallback()({ keyword: "budget" });

    expect(vi.mocked(fetchResource).mock.calls[0]![2]).toMatchObject({
      keyword: "budget",
    });
  });

  it("returns a tool error for Graph failures", async () => {
    vi.mocked(fetchResource).mockResolvedValue({
      success: false,
      error: new OutlookClientError("Access forbidden by Microsoft Graph", "FORBIDDEN", 403),
    });
    registerListSentMessages(server, config);

    const result = await toolCallback()({});

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe(
      "Microsoft Graph error [FORBIDDEN] (HTTP 403): Access forbidden by Microsoft Graph"
    );
  });

  it("throws McpError when authentication fails", async () => {
    vi.mocked(acquireToken).mockResolvedValue({
      success: false,
      error: new OutlookAuthError("Token request failed (400)", "TOKEN_REQUEST_FAILED", 400),
    });
    registerListSentMessages(server, config);

    await expect(toolCallback()({})).rejects.toThrow(McpError);
    expect(fetchResource).not.toHaveBeenCalled();
  });
});
