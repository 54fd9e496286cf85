/**
 * Outlook Graph Client
 *
 * Read-only HTTP client wrapper for Microsoft Graph requests.
 */

import { FETCH_TIMEOUT_MS, MICROSOFT_GRAPH_BASE_URL } from "../constants.js";
import type { GraphErrorBody } from "./graph-types.js";
import {
  OutlookClientError,
  type AccessToken,
  type OutlookClientConfig,
  type OutlookResult,
} from "./types.js";

export interface RequestOptions {
  /** URL path relative to the base URL (e.g., "/me/messages") */
  path: string;
  /** Query parameters */
  params?: Record<string, string>;
}

/**
 * Graph API client bound to one bearer token.
 */
export class OutlookClient {
  private readonly token: string;
  readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: OutlookClientConfig) {
    this.token = config.token;
    this.baseUrl = (config.baseUrl ?? MICROSOFT_GRAPH_BASE_URL).replace(
      /\/+$/,
      ""
    );
    this.timeoutMs = config.timeoutMs ?? FETCH_TIMEOUT_MS;
  }

  /** Make an authenticated GET request and parse the JSON body. */
  async request<T>(options: RequestOptions): Promise<OutlookResult<T>> {
    const { path, params } = options;

    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value);
      }
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url.toString(), {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return { success: false, error: await this.mapHttpError(response) };
      }

      text = await response.text();
    } catch (error) {
      return { success: false, error: this.mapNetworkError(error) };
    } finally {
      clearTimeout(timeoutId);
    }

    try {
      const data = JSON.parse(text) as T;
      return { success: true, data };
    } catch {
      return {
        success: false,
        error: new OutlookClientError(
          "Received non-JSON response from Microsoft Graph",
          "INVALID_RESPONSE",
          response.status,
          false
        ),
      };
    }
  }

  private async mapHttpError(
    response: Response
  ): Promise<OutlookClientError> {
    const status = response.status;

    let apiMessage: string | undefined;
    try {
      const body = (await response.json()) as GraphErrorBody | undefined;
      apiMessage = body?.message ?? body?.error?.message;
    } catch {
      // error body is optional; the status alone decides the code
    }

    const suffix = apiMessage ? `: ${apiMessage}` : "";

    switch (status) {
      case 401:
        return new OutlookClientError(
          `Invalid or expired access token${suffix}`,
          "UNAUTHORIZED",
          status,
          false,
          apiMessage
        );
      case 403:
        return new OutlookClientError(
          `Access forbidden by Microsoft Graph${suffix}`,
          "FORBIDDEN",
          status,
          false,
          apiMessage
        );
      case 404:
        return new OutlookClientError(
          `Resource not found${suffix}`,
          "NOT_FOUND",
          status,
          false,
          apiMessage
        );
      case 429:
        return new OutlookClientError(
          `Rate limit exceeded${suffix}`,
          "RATE_LIMITED",
          status,
          true,
          apiMessage
        );
      default:
        if (status >= 500) {
          return new OutlookClientError(
            `Server error (${status})${suffix}`,
            "SERVER_ERROR",
            status,
            true,
            apiMessage
          );
        }

        return new OutlookClientError(
          `Unexpected error (${status})${suffix}`,
          "UNKNOWN",
          status,
          false,
          apiMessage
        );
    }
  }

  private mapNetworkError(error: unknown): OutlookClientError {
    if (error instanceof Error) {
      if (error.name === "AbortError" || error.name === "TimeoutError") {
        return new OutlookClientError(
          "Request timed out",
          "TIMEOUT",
          undefined,
          true
        );
      }

      return new OutlookClientError(
        `Network error: ${error.message}`,
        "NETWORK_ERROR",
        undefined,
        false
      );
    }

    return new OutlookClientError(
      "Unknown network error",
      "UNKNOWN",
      undefined,
      false
    );
  }
}

/**
 * Create an OutlookClient for an access token from the current run.
 * Fails with MISSING_TOKEN when no token has been acquired yet.
 */
export function createClient(
  token: AccessToken | undefined,
  options: { baseUrl?: string | undefined; timeoutMs?: number | undefined } = {}
): OutlookResult<OutlookClient> {
  if (!token?.value) {
    return {
      success: false,
      error: new OutlookClientError(
        "No access token available. Authenticate before fetching.",
        "MISSING_TOKEN"
      ),
    };
  }

  return {
    success: true,
    data: new OutlookClient({
      token: token.value,
      baseUrl: options.baseUrl,
      timeoutMs: options.timeoutMs,
    }),
  };
}
