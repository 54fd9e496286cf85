/**
 * Outlook API Types
 *
 * Shared result and error types for the token, client, retrieval and
 * export modules.
 */

/** Error codes returned by the Graph client and the paginated fetcher */
export type OutlookErrorCode =
  | "MISSING_TOKEN"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "SERVER_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "INVALID_RESPONSE"
  | "INVALID_NEXT_LINK"
  | "PAGE_LIMIT_EXCEEDED"
  | "UNKNOWN";

/**
 * Typed error for Graph requests and pagination.
 *
 * `MISSING_TOKEN` is raised before any request is made, when a fetch is
 * attempted without an access token.
 */
export class OutlookClientError extends Error {
  constructor(
    message: string,
    public readonly code: OutlookErrorCode,
    public readonly statusCode?: number,
    public readonly retryable = false,
    public readonly apiMessage?: string
  ) {
    super(message);
    this.name = "OutlookClientError";
  }
}

/** Error codes returned by token acquisition */
export type OutlookAuthErrorCode =
  | "INVALID_CREDENTIALS"
  | "TOKEN_REQUEST_FAILED"
  | "INVALID_RESPONSE"
  | "NETWORK_ERROR"
  | "TIMEOUT";

/** Error for credential or identity provider rejection */
export class OutlookAuthError extends Error {
  constructor(
    message: string,
    public readonly code: OutlookAuthErrorCode,
    public readonly statusCode?: number,
    /** The provider's `error` field, e.g. "invalid_client" */
    public readonly providerError?: string
  ) {
    super(message);
    this.name = "OutlookAuthError";
  }
}

/** Error codes for bundle export and normalization I/O */
export type ExportErrorCode = "WRITE_FAILED" | "READ_FAILED" | "INVALID_INPUT";

export class ExportError extends Error {
  constructor(
    message: string,
    public readonly code: ExportErrorCode,
    public readonly path?: string
  ) {
    super(message);
    this.name = "ExportError";
  }
}

/** Success result from an Outlook operation */
export interface OutlookSuccess<T> {
  success: true;
  data: T;
}

/** Error result from an Outlook operation */
export interface OutlookFailure<E extends Error = OutlookClientError> {
  success: false;
  error: E;
}

/** Discriminated union for operation results */
export type OutlookResult<T, E extends Error = OutlookClientError> =
  | OutlookSuccess<T>
  | OutlookFailure<E>;

/** Credentials for the Microsoft identity platform. Never persisted. */
export interface OutlookCredentials {
  tenantId: string;
  clientId: string;
  clientSecret?: string | undefined;
  username?: string | undefined;
  password?: string | undefined;
}

export type GrantType = "password" | "client_credentials";

/** Bearer token acquired for the current run */
export interface AccessToken {
  value: string;
  /** ISO 8601 timestamp of acquisition */
  acquiredAt: string;
  /** ISO 8601 timestamp when the token expires, if the provider said */
  expiresAt?: string | undefined;
  grantType: GrantType;
}

/** Graph client configuration */
export interface OutlookClientConfig {
  token: string;
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
}
