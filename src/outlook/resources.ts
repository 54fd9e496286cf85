/**
 * Mailbox Resources
 *
 * The three Graph collections an export reads, and how to build the path
 * and OData query for each.
 */

import {
  DEFAULT_PAGE_SIZE,
  EVENT_SELECT_FIELDS,
  INBOX_SELECT_FIELDS,
  SENT_SELECT_FIELDS,
} from "../constants.js";
import { sanitizeId, toODataString } from "../utils/validation.js";

export type MailboxResource = "inbox" | "sent" | "calendar";

/** Resources in export order */
export const MAILBOX_RESOURCES: readonly MailboxResource[] = [
  "inbox",
  "sent",
  "calendar",
];

export interface ResourceQueryOptions {
  /** `/users/{mailboxUser}` instead of `/me` */
  mailboxUser?: string | undefined;
  /** Subject keyword; applies to the inbox only */
  keyword?: string | undefined;
  /** `$top` page size */
  pageSize?: number | undefined;
}

export interface ResourceRequest {
  path: string;
  params: Record<string, string>;
}

const RESOURCE_LABELS: Record<MailboxResource, string> = {
  inbox: "inbox emails",
  sent: "sent emails",
  calendar: "calendar events",
};

export function describeResource(resource: MailboxResource): string {
  return RESOURCE_LABELS[resource];
}

/** `/me` or `/users/{id}` */
export function mailboxRoot(mailboxUser?: string): string {
  return mailboxUser ? `/users/${sanitizeId(mailboxUser, "mailboxUser")}` : "/me";
}

/** `contains(subject,'<keyword>')`, or undefined for a blank keyword */
export function buildSubjectFilter(keyword?: string): string | undefined {
  const trimmed = keyword?.trim();
  if (!trimmed) {
    return undefined;
  }
  return `contains(subject,${toODataString(trimmed)})`;
}

/** Build the initial request for one resource collection. */
export function buildResourceRequest(
  resource: MailboxResource,
  options: ResourceQueryOptions = {}
): ResourceRequest {
  const root = mailboxRoot(options.mailboxUser);
  const top = String(options.pageSize ?? DEFAULT_PAGE_SIZE);

  switch (resource) {
    case "inbox": {
      const params: Record<string, string> = {
        $select: INBOX_SELECT_FIELDS,
        $top: top,
      };
      const filter = buildSubjectFilter(options.keyword);
      if (filter) {
        // Graph rejects $orderby on a property missing from $filter
        params["$filter"] = filter;
      } else {
        params["$orderby"] = "receivedDateTime desc";
      }
      return { path: `${root}/messages`, params };
    }
    case "sent":
      return {
        path: `${root}/mailFolders('sentitems')/messages`,
        params: {
          $select: SENT_SELECT_FIELDS,
          $orderby: "sentDateTime desc",
          $top: top,
        },
      };
    case "calendar":
      return {
        path: `${root}/events`,
        params: {
          $select: EVENT_SELECT_FIELDS,
          $orderby: "start/dateTime desc",
          $top: top,
        },
      };
  }
}
