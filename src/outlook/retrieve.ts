/**
 * Mailbox Retrieval
 *
 * Fetch the inbox, sent and calendar collections over one read-only
 * access token. The three fetches are independent and can run one after
 * another or together.
 */

import { APP_NAME } from "../constants.js";
import { createClient } from "./client.js";
import type { GraphRecord } from "./graph-types.js";
import { fetchAllPages } from "./pagination.js";
import {
  MAILBOX_RESOURCES,
  buildResourceRequest,
  describeResource,
  type MailboxResource,
  type ResourceQueryOptions,
} from "./resources.js";
import type {
  AccessToken,
  OutlookClientError,
  OutlookResult,
} from "./types.js";

export interface FetchResourceOptions extends ResourceQueryOptions {
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  maxPages?: number | undefined;
}

export interface RetrieveMailboxOptions extends FetchResourceOptions {
  /** Run the three fetches with Promise.all instead of in sequence */
  concurrent?: boolean | undefined;
}

export interface MailboxData {
  inbox: GraphRecord[];
  sent: GraphRecord[];
  calendar: GraphRecord[];
}

export type MailboxResult =
  | { success: true; data: MailboxData }
  | { success: false; resource: MailboxResource; error: OutlookClientError };

/**
 * Fetch every record of one resource collection.
 *
 * Fails with MISSING_TOKEN, before any request, when `token` is absent.
 */
export async function fetchResource(
  resource: MailboxResource,
  token: AccessToken | undefined,
  options: FetchResourceOptions = {}
): Promise<OutlookResult<GraphRecord[]>> {
  const clientResult = createClient(token, {
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
  });
  if (!clientResult.success) {
    return clientResult;
  }

  const label = describeResource(resource);
  const { path, params } = buildResourceRequest(resource, options);
  console.error(`[${APP_NAME}] Fetching ${label}...`);

  const result = await fetchAllPages<GraphRecord>(
    clientResult.data,
    path,
    params,
    options.maxPages,
    (items, pageNumber) => {
      console.error(
        `[${APP_NAME}] Retrieved ${items.length} ${label} from page ${pageNumber}`
      );
    }
  );

  if (result.success) {
    console.error(`[${APP_NAME}] Retrieved ${result.data.length} ${label}`);
  }
  return result;
}

/**
 * Fetch all three collections. The first failure, in inbox/sent/calendar
 * order, is reported; no partial data is returned.
 */
export async function retrieveMailbox(
  token: AccessToken | undefined,
  options: RetrieveMailboxOptions = {}
): Promise<MailboxResult> {
  const results: OutlookResult<GraphRecord[]>[] = [];

  if (options.concurrent) {
    results.push(
      ...(await Promise.all(
        MAILBOX_RESOURCES.map((resource) =>
          fetchResource(resource, token, options)
        )
      ))
    );
  } else {
    for (const resource of MAILBOX_RESOURCES) {
      const result = await fetchResource(resource, token, options);
      results.push(result);
      if (!result.success) {
        break;
      }
    }
  }

  const data: MailboxData = { inbox: [], sent: [], calendar: [] };
  for (const [index, resource] of MAILBOX_RESOURCES.entries()) {
    const result = results[index];
    if (!result) {
      break;
    }
    if (!result.success) {
      return { success: false, resource, error: result.error };
    }
    data[resource] = result.data;
  }

  return { success: true, data };
}
