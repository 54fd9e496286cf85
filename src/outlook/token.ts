/**
 * Token Acquisition
 *
 * Exchanges tenant/application credentials for a Microsoft Graph bearer
 * token. One request per call: no cache, no refresh, no retry. The token
 * is returned as a value and threaded explicitly into every fetch.
 *
 * Grant selection:
 *   - username + password present: resource-owner password credentials
 *     (delegated, `/me` works)
 *   - otherwise: client credentials (app-only, needs a mailbox user)
 */

import { z } from "zod";
import {
  DEFAULT_GRAPH_SCOPES,
  FETCH_TIMEOUT_MS,
  MICROSOFT_IDENTITY_BASE_URL,
} from "../constants.js";
import {
  OutlookAuthError,
  type AccessToken,
  type GrantType,
  type OutlookCredentials,
  type OutlookResult,
} from "./types.js";

export interface AcquireTokenOptions {
  authorityBaseUrl?: string | undefined;
  scopes?: string[] | undefined;
  timeoutMs?: number | undefined;
  /** Clock used for `acquiredAt` and `expiresAt` */
  now?: (() => Date) | undefined;
}

const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().positive().optional(),
  scope: z.string().optional(),
});

type TokenResult = OutlookResult<AccessToken, OutlookAuthError>;

/** Decide which OAuth grant the credentials allow. */
export function selectGrantType(credentials: OutlookCredentials): GrantType {
  return credentials.username && credentials.password
    ? "password"
    : "client_credentials";
}

/** Build the OAuth token endpoint URL for the tenant. */
export function getTokenEndpoint(
  tenantId: string,
  authorityBaseUrl: string = MICROSOFT_IDENTITY_BASE_URL
): string {
  const base = authorityBaseUrl.replace(/\/+$/, "");
  return `${base}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
}

/** Form body for the token request. */
export function buildTokenRequestBody(
  credentials: OutlookCredentials,
  scopes: string[] = DEFAULT_GRAPH_SCOPES
): URLSearchParams {
  const body = new URLSearchParams({
    client_id: credentials.clientId,
    scope: scopes.join(" "),
  });

  if (
    selectGrantType(credentials) === "password" &&
    credentials.username &&
    credentials.password
  ) {
    body.set("grant_type", "password");
    body.set("username", credentials.username);
    body.set("password", credentials.password);
    if (credentials.clientSecret) {
      body.set("client_secret", credentials.clientSecret);
    }
    return body;
  }

  body.set("grant_type", "client_credentials");
  body.set("client_secret", credentials.clientSecret ?? "");
  return body;
}

/** Check credentials for presence only; no format validation. */
export function checkCredentials(
  credentials: OutlookCredentials
): OutlookAuthError | undefined {
  const missing: string[] = [];
  if (!credentials.tenantId) missing.push("tenantId");
  if (!credentials.clientId) missing.push("clientId");

  const hasUserPair = Boolean(credentials.username && credentials.password);
  if (!hasUserPair && !credentials.clientSecret) {
    missing.push("clientSecret or username/password");
  }

  if (missing.length === 0) {
    return undefined;
  }

  return new OutlookAuthError(
    `Missing credentials: ${missing.join(", ")}`,
    "INVALID_CREDENTIALS"
  );
}

/**
 * Request an access token from the identity provider's token endpoint.
 */
export async function acquireToken(
  credentials: OutlookCredentials,
  options: AcquireTokenOptions = {}
): Promise<TokenResult> {
  const invalid = checkCredentials(credentials);
  if (invalid) {
    return { success: false, error: invalid };
  }

  const now = options.now ?? (() => new Date());
  const grantType = selectGrantType(credentials);
  const body = buildTokenRequestBody(credentials, options.scopes);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, options.timeoutMs ?? FETCH_TIMEOUT_MS);

  let response: Response;
  let text: string;
  try {
    response = await fetch(
      getTokenEndpoint(credentials.tenantId, options.authorityBaseUrl),
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        signal: controller.signal,
      }
    );
    text = await response.text();
  } catch (error) {
    return { success: false, error: mapNetworkError(error) };
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    return { success: false, error: mapTokenError(response.status, text) };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return {
      success: false,
      error: new OutlookAuthError(
        "Token endpoint returned invalid JSON",
        "INVALID_RESPONSE",
        response.status
      ),
    };
  }

  const parsed = TokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      error: new OutlookAuthError(
        `Invalid token response: ${parsed.error.message}`,
        "INVALID_RESPONSE",
        response.status
      ),
    };
  }

  const acquiredAt = now();
  const token: AccessToken = {
    value: parsed.data.access_token,
    acquiredAt: acquiredAt.toISOString(),
    grantType,
  };

  if (parsed.data.expires_in !== undefined) {
    token.expiresAt = new Date(
      acquiredAt.getTime() + parsed.data.expires_in * 1000
    ).toISOString();
  }

  return { success: true, data: token };
}

/** Keep only the provider's `error` and `error_description` fields. */
function mapTokenError(status: number, text: string): OutlookAuthError {
  let message = `Token request failed (${status})`;
  let providerError: string | undefined;

  try {
    const parsed = TokenErrorSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const errorCode = parsed.data.error;
      const errorDesc = parsed.data.error_description;
      if (errorCode || errorDesc) {
        providerError = errorCode;
        message = `Token request failed (${status}): ${errorCode ?? "unknown_error"}${errorDesc ? ` - ${errorDesc}` : ""}`;
      }
    }
  } catch {
    // Response is not JSON, use generic message
  }

  return new OutlookAuthError(
    message,
    "TOKEN_REQUEST_FAILED",
    status,
    providerError
  );
}

function mapNetworkError(error: unknown): OutlookAuthError {
  if (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  ) {
    return new OutlookAuthError("Token request timed out", "TIMEOUT");
  }

  return new OutlookAuthError(
    `Token request failed: ${error instanceof Error ? error.message : "unknown network error"}`,
    "NETWORK_ERROR"
  );
}
