/**
 * Shared handler for the list-* tools.
 *
 * When top is provided, returns a single page of results. When omitted,
 * follows all pagination links to return the complete collection.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ExportConfig } from "../config.js";
import { createClient } from "../outlook/client.js";
import type { GraphRecord } from "../outlook/graph-types.js";
import { fetchPage } from "../outlook/pagination.js";
import {
  buildResourceRequest,
  type MailboxResource,
} from "../outlook/resources.js";
import { fetchResource } from "../outlook/retrieve.js";
import {
  getAccessTokenOrThrow,
  handleApiResult,
  toolJsonSuccess,
} from "./helpers.js";

export interface ListResourceArgs {
  top?: number | undefined;
  keyword?: string | undefined;
}

export async function listResource(
  config: ExportConfig,
  resource: MailboxResource,
  args: ListResourceArgs
): Promise<CallToolResult> {
  const token = await getAccessTokenOrThrow(config);
  const keyword = args.keyword ?? config.keyword;

  if (args.top !== undefined) {
    const clientResult = createClient(token, {
      baseUrl: config.graphBaseUrl,
      timeoutMs: config.timeoutMs,
    });
    if (!clientResult.success) {
      return handleApiResult(clientResult);
    }

    const { path, params } = buildResourceRequest(resource, {
      mailboxUser: config.mailboxUser,
      keyword,
      pageSize: args.top,
    });
    const result = await fetchPage<GraphRecord>(clientResult.data, path, params);
    return handleApiResult(result, (data) => toolJsonSuccess(data.value));
  }

  const result = await fetchResource(resource, token, {
    mailboxUser: config.mailboxUser,
    keyword,
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    baseUrl: config.graphBaseUrl,
    timeoutMs: config.timeoutMs,
  });
  return handleApiResult(result);
}
