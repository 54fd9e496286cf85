/**
 * Export Configuration
 *
 * Reads OUTLOOK_* environment variables (a .env file is loaded by the CLI
 * entry point), applies command-line overrides and validates the result.
 */

import { z } from "zod";
import {
  DEFAULT_GRAPH_SCOPES,
  DEFAULT_MAX_PAGINATION_PAGES,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_PAGE_SIZE,
  FETCH_TIMEOUT_MS,
  MAX_PAGE_SIZE,
  MICROSOFT_GRAPH_BASE_URL,
  MICROSOFT_IDENTITY_BASE_URL,
  MIN_FETCH_TIMEOUT_MS,
} from "./constants.js";
import type { OutlookCredentials, OutlookResult } from "./outlook/types.js";
import { selectGrantType } from "./outlook/token.js";
import {
  UrlValidationError,
  validateMicrosoftUrl,
} from "./utils/validation.js";

export interface ExportConfig {
  credentials: OutlookCredentials;
  /** Mailbox to read with an app-only token; `/me` when unset */
  mailboxUser?: string | undefined;
  /** Inbox subject keyword filter */
  keyword?: string | undefined;
  outputPath: string;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
  concurrent: boolean;
  authorityBaseUrl: string;
  graphBaseUrl: string;
  scopes: string[];
}

/** Values given on the command line; each wins over its variable. */
export interface ConfigOverrides {
  tenantId?: string | undefined;
  clientId?: string | undefined;
  clientSecret?: string | undefined;
  username?: string | undefined;
  password?: string | undefined;
  mailboxUser?: string | undefined;
  keyword?: string | undefined;
  outputPath?: string | undefined;
  pageSize?: number | string | undefined;
  maxPages?: number | string | undefined;
  timeoutMs?: number | string | undefined;
  concurrent?: boolean | string | undefined;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .min(1, `${name} is required`);

const booleanFlag = z
  .union([
    z.boolean(),
    z
      .enum(["true", "false", "1", "0", "yes", "no"])
      .transform((value) => value === "true" || value === "1" || value === "yes"),
  ])
  .default(false);

const ConfigSchema = z
  .object({
    tenantId: requiredString("OUTLOOK_TENANT_ID"),
    clientId: requiredString("OUTLOOK_CLIENT_ID"),
    clientSecret: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    mailboxUser: z.string().optional(),
    keyword: z.string().optional(),
    outputPath: z.string().default(DEFAULT_OUTPUT_PATH),
    pageSize: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_PAGE_SIZE)
      .default(DEFAULT_PAGE_SIZE),
    maxPages: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_MAX_PAGINATION_PAGES),
    timeoutMs: z.coerce
      .number()
      .int()
      .min(MIN_FETCH_TIMEOUT_MS)
      .default(FETCH_TIMEOUT_MS),
    concurrent: booleanFlag,
    authorityBaseUrl: z.string().default(MICROSOFT_IDENTITY_BASE_URL),
    graphBaseUrl: z.string().default(MICROSOFT_GRAPH_BASE_URL),
    scopes: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    const hasUserPair = Boolean(value.username && value.password);
    if (Boolean(value.username) !== Boolean(value.password)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [value.username ? "password" : "username"],
        message: "OUTLOOK_USERNAME and OUTLOOK_PASSWORD must be set together",
      });
    }
    if (!hasUserPair && !value.clientSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["clientSecret"],
        message:
          "OUTLOOK_CLIENT_SECRET or OUTLOOK_USERNAME/OUTLOOK_PASSWORD is required",
      });
    }

    for (const [key, kind] of [
      ["authorityBaseUrl", "authority"],
      ["graphBaseUrl", "graph"],
    ] as const) {
      try {
        validateMicrosoftUrl(value[key], kind);
      } catch (error) {
        if (!(error instanceof UrlValidationError)) throw error;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: error.message,
        });
      }
    }
  });

/** Space-separated scope list; falls back to the Graph default scope. */
export function parseScopes(scopeString: string | undefined): string[] {
  const parsed = (scopeString ?? "")
    .split(/\s+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);

  return parsed.length > 0 ? parsed : [...DEFAULT_GRAPH_SCOPES];
}

/** Treat blank values as unset so defaults apply. */
function present<T>(value: T | undefined): T | undefined {
  if (typeof value === "string" && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

/**
 * Build the export configuration from overrides and environment.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): OutlookResult<ExportConfig, ConfigError> {
  const pick = <K extends keyof ConfigOverrides>(key: K, variable: string) =>
    present(overrides[key]) ?? present(env[variable]);

  const parsed = ConfigSchema.safeParse({
    tenantId: pick("tenantId", "OUTLOOK_TENANT_ID"),
    clientId: pick("clientId", "OUTLOOK_CLIENT_ID"),
    clientSecret: pick("clientSecret", "OUTLOOK_CLIENT_SECRET"),
    username: pick("username", "OUTLOOK_USERNAME"),
    password: pick("password", "OUTLOOK_PASSWORD"),
    mailboxUser: pick("mailboxUser", "OUTLOOK_MAILBOX_USER"),
    keyword: pick("keyword", "OUTLOOK_INBOX_KEYWORD"),
    outputPath: pick("outputPath", "OUTLOOK_OUTPUT_PATH"),
    pageSize: pick("pageSize", "OUTLOOK_PAGE_SIZE"),
    maxPages: pick("maxPages", "OUTLOOK_MAX_PAGES"),
    timeoutMs: pick("timeoutMs", "OUTLOOK_TIMEOUT_MS"),
    concurrent: pick("concurrent", "OUTLOOK_CONCURRENT_FETCH"),
    authorityBaseUrl: present(env["OUTLOOK_AUTHORITY_BASE_URL"]),
    graphBaseUrl: present(env["OUTLOOK_GRAPH_BASE_URL"]),
    scopes: present(env["OUTLOOK_SCOPES"]),
  });

  if (!parsed.success) {
    return {
      success: false,
      error: new ConfigError(
        parsed.error.issues.map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message
        )
      ),
    };
  }

  const value = parsed.data;
  const credentials: OutlookCredentials = {
    tenantId: value.tenantId,
    clientId: value.clientId,
    clientSecret: value.clientSecret,
    username: value.username,
    password: value.password,
  };

  if (selectGrantType(credentials) === "client_credentials" && !value.mailboxUser) {
    return {
      success: false,
      error: new ConfigError([
        "mailboxUser: OUTLOOK_MAILBOX_USER is required with a client secret, since an app-only token has no /me",
      ]),
    };
  }

  return {
    success: true,
    data: {
      credentials,
      mailboxUser: value.mailboxUser,
      keyword: value.keyword,
      outputPath: value.outputPath,
      pageSize: value.pageSize,
      maxPages: value.maxPages,
      timeoutMs: value.timeoutMs,
      concurrent: value.concurrent,
      authorityBaseUrl: value.authorityBaseUrl,
      graphBaseUrl: value.graphBaseUrl,
      scopes: parseScopes(value.scopes),
    },
  };
}
