/**
 * Export Pipeline
 *
 * One run: authenticate, fetch inbox/sent/calendar, write the bundle.
 * Each step either advances or ends the run in `failed` with the step
 * that broke; nothing is retried and no file is written after a failed
 * fetch.
 */

import { APP_NAME } from "./constants.js";
import type { ExportConfig } from "./config.js";
import {
  buildResultBundle,
  exportBundle,
  type BundleTotals,
} from "./export/bundle.js";
import type { MailboxResource } from "./outlook/resources.js";
import { retrieveMailbox } from "./outlook/retrieve.js";
import { acquireToken } from "./outlook/token.js";
import type {
  ExportError,
  OutlookAuthError,
  OutlookClientError,
} from "./outlook/types.js";

export type RunStep =
  | "authenticate"
  | "fetch-inbox"
  | "fetch-sent"
  | "fetch-calendar"
  | "export";

export type RunReport =
  | { status: "exported"; outputPath: string; totals: BundleTotals }
  | {
      status: "failed";
      step: RunStep;
      error: OutlookAuthError | OutlookClientError | ExportError;
    };

export interface RunOptions {
  /** Clock for token and bundle timestamps */
  now?: (() => Date) | undefined;
}

const FETCH_STEPS: Record<MailboxResource, RunStep> = {
  inbox: "fetch-inbox",
  sent: "fetch-sent",
  calendar: "fetch-calendar",
};

/**
 * Run the export once.
 */
export async function runExport(
  config: ExportConfig,
  options: RunOptions = {}
): Promise<RunReport> {
  const tokenResult = await acquireToken(config.credentials, {
    authorityBaseUrl: config.authorityBaseUrl,
    scopes: config.scopes,
    timeoutMs: config.timeoutMs,
    now: options.now,
  });
  if (!tokenResult.success) {
    return fail("authenticate", tokenResult.error);
  }
  console.error(`[${APP_NAME}] Authentication successful.`);

  const mailbox = await retrieveMailbox(tokenResult.data, {
    mailboxUser: config.mailboxUser,
    keyword: config.keyword,
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    baseUrl: config.graphBaseUrl,
    timeoutMs: config.timeoutMs,
    concurrent: config.concurrent,
  });
  if (!mailbox.success) {
    return fail(FETCH_STEPS[mailbox.resource], mailbox.error);
  }

  const { inbox, sent, calendar } = mailbox.data;
  const bundle = buildResultBundle(inbox, sent, calendar, options.now);
  const written = await exportBundle(bundle, config.outputPath);
  if (!written.success) {
    return fail("export", written.error);
  }

  console.error(`[${APP_NAME}] Data saved to ${config.outputPath}`);
  return {
    status: "exported",
    outputPath: config.outputPath,
    totals: { ...bundle.total_items },
  };
}

function fail(
  step: RunStep,
  error: OutlookAuthError | OutlookClientError | ExportError
): RunReport {
  console.error(`[${APP_NAME}] Step "${step}" failed: ${error.message}`);
  return { status: "failed", step, error };
}
