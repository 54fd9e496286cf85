/**
 * Pagination Helpers
 *
 * Utilities for reading paginated OData collections from the Graph API.
 * `iteratePages` is the lazy form; `fetchAllPages` collects it with an
 * all-or-nothing failure policy.
 */

import { DEFAULT_MAX_PAGINATION_PAGES } from "../constants.js";
import type { OutlookClient, RequestOptions } from "./client.js";
import type { GraphODataCollection } from "./graph-types.js";
import { OutlookClientError, type OutlookResult } from "./types.js";

/**
 * Fetch a single page from a collection endpoint.
 */
export async function fetchPage<T>(
  client: OutlookClient,
  path: string,
  params?: Record<string, string>
): Promise<OutlookResult<GraphODataCollection<T>>> {
  const options: RequestOptions = { path };
  if (params !== undefined) {
    options.params = params;
  }

  const result = await client.request<GraphODataCollection<T>>(options);
  if (!result.success) {
    return result;
  }

  if (!isCollection<T>(result.data)) {
    return {
      success: false,
      error: new OutlookClientError(
        `Collection response for ${path} has no value array`,
        "INVALID_RESPONSE"
      ),
    };
  }

  return result;
}

/**
 * Turn an absolute @odata.nextLink into a request relative to the client's
 * base URL. Links pointing anywhere else are refused.
 */
export function resolveNextLink(
  client: OutlookClient,
  nextLink: string
): RequestOptions | undefined {
  let nextUrl: URL;
  let baseUrl: URL;
  try {
    nextUrl = new URL(nextLink);
    baseUrl = new URL(client.baseUrl);
  } catch {
    return undefined;
  }

  const basePath = baseUrl.pathname.replace(/\/+$/, "");
  if (
    nextUrl.origin !== baseUrl.origin ||
    !nextUrl.pathname.startsWith(`${basePath}/`)
  ) {
    return undefined;
  }

  return {
    path: nextUrl.pathname.slice(basePath.length),
    params: Object.fromEntries(nextUrl.searchParams.entries()),
  };
}

/**
 * Lazily yield each page's items, following @odata.nextLink until a page
 * omits it. Throws OutlookClientError on the first failed page; the
 * generator is finished after that and cannot be resumed.
 *
 * @param maxPages - Number of nextLink hops allowed before giving up
 */
export async function* iteratePages<T>(
  client: OutlookClient,
  path: string,
  params?: Record<string, string>,
  maxPages: number = DEFAULT_MAX_PAGINATION_PAGES
): AsyncGenerator<T[], void, undefined> {
  let current: RequestOptions | undefined =
    params === undefined ? { path } : { path, params };
  let hops = 0;

  while (current) {
    const result = await fetchPage<T>(client, current.path, current.params);
    if (!result.success) {
      throw result.error;
    }

    yield result.data.value;

    const nextLink = result.data["@odata.nextLink"];
    if (!nextLink) {
      return;
    }

    if (hops >= maxPages) {
      throw new OutlookClientError(
        `Pagination for ${path} exceeded ${maxPages} pages`,
        "PAGE_LIMIT_EXCEEDED"
      );
    }

    current = resolveNextLink(client, nextLink);
    if (!current) {
      throw new OutlookClientError(
        `Refusing to follow nextLink outside ${client.baseUrl}`,
        "INVALID_NEXT_LINK"
      );
    }
    hops++;
  }
}

/**
 * Fetch ALL items from a paginated collection endpoint, keeping the
 * provider's page order and within-page order.
 *
 * If any page fails, the items gathered so far are dropped and only the
 * error is returned.
 */
export async function fetchAllPages<T>(
  client: OutlookClient,
  path: string,
  params?: Record<string, string>,
  maxPages: number = DEFAULT_MAX_PAGINATION_PAGES,
  onPage?: (items: T[], pageNumber: number) => void
): Promise<OutlookResult<T[]>> {
  const allItems: T[] = [];
  let pageNumber = 0;

  try {
    for await (const items of iteratePages<T>(client, path, params, maxPages)) {
      pageNumber++;
      onPage?.(items, pageNumber);
      allItems.push(...items);
    }
  } catch (error) {
    if (error instanceof OutlookClientError) {
      return { success: false, error };
    }
    throw error;
  }

  return { success: true, data: allItems };
}

function isCollection<T>(data: unknown): data is GraphODataCollection<T> {
  return (
    typeof data === "object" &&
    data !== null &&
    Array.isArray((data as { value?: unknown }).value)
  );
}
