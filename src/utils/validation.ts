/**
 * Validation Utilities
 *
 * Input validation and sanitization helpers for safe API interactions.
 */

/**
 * Validate and encode a path segment (user id or UPN) for safe URL
 * interpolation. Encoding blocks path traversal and query injection.
 */
export function sanitizeId(id: string, paramName: string): string {
  if (!id || id.trim().length === 0) {
    throw new Error(`${paramName} must not be empty`);
  }
  return encodeURIComponent(id.trim());
}

/**
 * Quote a value as an OData string literal. Single quotes are doubled.
 */
export function toODataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// ---------------------------------------------------------------------------
// Microsoft URL Allowlisting
// ---------------------------------------------------------------------------

/** Allowed hostnames for Microsoft identity platform endpoints */
const ALLOWED_AUTHORITY_HOSTNAMES = new Set([
  "login.microsoftonline.com",
  "login.microsoftonline.us",   // US Government
  "login.chinacloudapi.cn",     // China
  "login.microsoftonline.de",   // Germany (legacy)
]);

/** Allowed hostnames for Microsoft Graph API endpoints */
const ALLOWED_GRAPH_HOSTNAMES = new Set([
  "graph.microsoft.com",
  "graph.microsoft.us",         // US Government
  "microsoftgraph.chinacloudapi.cn", // China
  "graph.microsoft.de",         // Germany (legacy)
]);

export class UrlValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UrlValidationError";
  }
}

/**
 * Validate that a base URL points to a known Microsoft endpoint.
 * Throws UrlValidationError if it does not parse or the hostname is not in
 * the allowlist. Any hostname passes when NODE_ENV is development or test.
 */
export function validateMicrosoftUrl(
  url: string,
  kind: "authority" | "graph"
): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new UrlValidationError(`Invalid ${kind} base URL: ${url}`, {
      cause: error,
    });
  }

  const env = process.env["NODE_ENV"];
  if (env === "development" || env === "test") return;

  const allowlist =
    kind === "authority" ? ALLOWED_AUTHORITY_HOSTNAMES : ALLOWED_GRAPH_HOSTNAMES;

  if (!allowlist.has(parsed.hostname.toLowerCase())) {
    throw new UrlValidationError(
      `${kind === "authority" ? "Authority" : "Graph API"} base URL hostname "${parsed.hostname}" is not in the allowed list. ` +
        `Allowed: ${[...allowlist].join(", ")}. ` +
        `Set NODE_ENV=development to bypass this check.`
    );
  }
}
