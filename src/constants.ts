/**
 * Shared Constants
 *
 * Centralized constants used across the application.
 */

/** Program name used in log prefixes and the MCP server identity */
export const APP_NAME = "outlook-export";

/** Microsoft identity authority base URL */
export const MICROSOFT_IDENTITY_BASE_URL = "https://login.microsoftonline.com";

/** Microsoft Graph API base URL */
export const MICROSOFT_GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

/** Scope requesting every Graph permission granted to the application */
export const DEFAULT_GRAPH_SCOPES = ["https://graph.microsoft.com/.default"];

/** Timeout for external API requests in milliseconds (30 seconds) */
export const FETCH_TIMEOUT_MS = 30_000;

/** Lowest accepted request timeout in milliseconds */
export const MIN_FETCH_TIMEOUT_MS = 1_000;

/** Default $top for collection requests */
export const DEFAULT_PAGE_SIZE = 100;

/** Largest $top Graph accepts for messages and events */
export const MAX_PAGE_SIZE = 1_000;

/** Maximum number of @odata.nextLink hops per collection */
export const DEFAULT_MAX_PAGINATION_PAGES = 500;

/** Default path of the exported Result Bundle */
export const DEFAULT_OUTPUT_PATH = "outlook_data.json";

/** Default paths of the normalized outputs */
export const DEFAULT_NORMALIZED_CSV_PATH = "outlook_data_processed.csv";
export const DEFAULT_NORMALIZED_JSON_PATH = "outlook_data_processed.json";

/** Number of body words kept in a normalized row summary */
export const SUMMARY_WORD_LIMIT = 50;

/** $select fields for inbox message responses */
export const INBOX_SELECT_FIELDS =
  "id,subject,from,toRecipients,receivedDateTime,bodyPreview,importance,isRead,hasAttachments,flag";

/** $select fields for sent message responses */
export const SENT_SELECT_FIELDS =
  "id,subject,from,toRecipients,sentDateTime,bodyPreview,importance,hasAttachments,flag";

/** $select fields for calendar event responses */
export const EVENT_SELECT_FIELDS =
  "id,subject,start,end,location,bodyPreview,importance,isAllDay,recurrence,organizer,attendees";
