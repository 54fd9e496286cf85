/**
 * Outlook Module
 *
 * Exports the Graph client, token acquisition, pagination, retrieval and
 * bundle helpers.
 */

export { OutlookClient, createClient, type RequestOptions } from "./client.js";
export {
  OutlookClientError,
  OutlookAuthError,
  ExportError,
  type OutlookResult,
  type OutlookSuccess,
  type OutlookFailure,
  type OutlookErrorCode,
  type OutlookAuthErrorCode,
  type ExportErrorCode,
  type OutlookCredentials,
  type OutlookClientConfig,
  type AccessToken,
  type GrantType,
} from "./types.js";

export type {
  GraphRecord,
  GraphODataCollection,
  GraphErrorBody,
} from "./graph-types.js";

export {
  acquireToken,
  checkCredentials,
  selectGrantType,
  getTokenEndpoint,
  buildTokenRequestBody,
  type AcquireTokenOptions,
} from "./token.js";

export {
  fetchPage,
  fetchAllPages,
  iteratePages,
  resolveNextLink,
} from "./pagination.js";

export {
  MAILBOX_RESOURCES,
  buildResourceRequest,
  buildSubjectFilter,
  mailboxRoot,
  type MailboxResource,
  type ResourceQueryOptions,
} from "./resources.js";

export {
  fetchResource,
  retrieveMailbox,
  type MailboxData,
  type MailboxResult,
  type FetchResourceOptions,
  type RetrieveMailboxOptions,
} from "./retrieve.js";

export {
  buildResultBundle,
  exportBundle,
  readBundle,
  serializeBundle,
  type ResultBundle,
  type BundleTotals,
} from "../export/bundle.js";
export {
  normalizeBundle,
  normalizeRecord,
  rowsToCsv,
  writeNormalized,
  type NormalizedRow,
} from "../export/normalize.js";
