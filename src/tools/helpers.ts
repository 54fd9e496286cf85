/**
 * Tool Response Helpers
 *
 * Shared utilities for formatting MCP tool responses, acquiring a token
 * per call and mapping Outlook errors.
 */

import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ExportConfig } from "../config.js";
import { acquireToken } from "../outlook/token.js";
import type {
  AccessToken,
  OutlookAuthError,
  OutlookClientError,
  OutlookResult,
} from "../outlook/types.js";

/**
 * Create a success response containing a JSON-serialized object.
 */
export function toolJsonSuccess(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Create a tool-level error response.
 */
export function toolError(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

/**
 * Handle an OutlookResult<T>, returning either a success result (via
 * transform) or a mapped error result. Auth errors are thrown as McpError.
 */
export function handleApiResult<T>(
  result: OutlookResult<T>,
  transform?: (data: T) => CallToolResult
): CallToolResult {
  if (result.success) {
    return transform ? transform(result.data) : toolJsonSuccess(result.data);
  }
  return mapOutlookError(result.error);
}

/**
 * Map an OutlookClientError to a tool response or throw a protocol error.
 */
export function mapOutlookError(error: OutlookClientError): CallToolResult {
  if (error.code === "MISSING_TOKEN" || error.code === "UNAUTHORIZED") {
    throw new McpError(
      ErrorCode.InternalError,
      `Authentication failed: ${error.message}`
    );
  }

  const codeLabel = error.statusCode ? ` (HTTP ${error.statusCode})` : "";
  return toolError(
    `Microsoft Graph error [${error.code}]${codeLabel}: ${error.message}`
  );
}

/** Protocol error for a rejected token request. */
export function authFailure(error: OutlookAuthError): McpError {
  return new McpError(
    ErrorCode.InternalError,
    `Authentication failed: ${error.message}`
  );
}

/**
 * Acquire a fresh token for one tool call. Tokens are not kept between
 * calls.
 */
export async function getAccessTokenOrThrow(
  config: ExportConfig
): Promise<AccessToken> {
  const result = await acquireToken(config.credentials, {
    authorityBaseUrl: config.authorityBaseUrl,
    scopes: config.scopes,
    timeoutMs: config.timeoutMs,
  });
  if (!result.success) {
    throw authFailure(result.error);
  }
  return result.data;
}
