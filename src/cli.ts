/**
 * Command Line Interface
 *
 *   outlook-export [export]   authenticate, fetch and write the bundle
 *   outlook-export normalize  flatten a bundle into CSV and JSON rows
 *   outlook-export serve      run the MCP server on stdio
 */

import { Command } from "commander";
import {
  APP_NAME,
  DEFAULT_NORMALIZED_CSV_PATH,
  DEFAULT_NORMALIZED_JSON_PATH,
  DEFAULT_OUTPUT_PATH,
} from "./constants.js";
import { loadConfig, type ConfigOverrides, type ExportConfig } from "./config.js";
import { readBundle } from "./export/bundle.js";
import { normalizeBundle, writeNormalized } from "./export/normalize.js";
import { runExport } from "./pipeline.js";
import { createServer, startStdioServer } from "./server.js";

interface ConnectionOptions {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  username?: string;
  password?: string;
  mailboxUser?: string;
  timeoutMs?: string;
}

interface ExportOptions extends ConnectionOptions {
  keyword?: string;
  output?: string;
  pageSize?: string;
  maxPages?: string;
  concurrent?: boolean;
}

interface NormalizeOptions {
  input: string;
  output: string;
  outputJson: string | false;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option("--tenant-id <id>", "directory (tenant) id [OUTLOOK_TENANT_ID]")
    .option("--client-id <id>", "application (client) id [OUTLOOK_CLIENT_ID]")
    .option("--client-secret <secret>", "client secret [OUTLOOK_CLIENT_SECRET]")
    .option("--username <upn>", "resource-owner username [OUTLOOK_USERNAME]")
    .option("--password <password>", "resource-owner password [OUTLOOK_PASSWORD]")
    .option(
      "--mailbox-user <id>",
      "read /users/<id> instead of /me [OUTLOOK_MAILBOX_USER]"
    )
    .option("--timeout-ms <ms>", "per-request timeout [OUTLOOK_TIMEOUT_MS]");
}

function toOverrides(options: ExportOptions): ConfigOverrides {
  return {
    tenantId: options.tenantId,
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    username: options.username,
    password: options.password,
    mailboxUser: options.mailboxUser,
    keyword: options.keyword,
    outputPath: options.output,
    pageSize: options.pageSize,
    maxPages: options.maxPages,
    timeoutMs: options.timeoutMs,
    concurrent: options.concurrent,
  };
}

/** Load config or report the problems and set a failing exit code. */
function resolveConfig(
  options: ExportOptions,
  env: NodeJS.ProcessEnv
): ExportConfig | undefined {
  const result = loadConfig(toOverrides(options), env);
  if (!result.success) {
    for (const issue of result.error.issues) {
      console.error(`[${APP_NAME}] Config: ${issue}`);
    }
    process.exitCode = 1;
    return undefined;
  }
  return result.data;
}

export interface ProgramOptions {
  version: string;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(options: ProgramOptions): Command {
  const env = options.env ?? process.env;
  const program = new Command();

  program
    .name(APP_NAME)
    .description(
      "Export Outlook inbox, sent mail and calendar events from Microsoft Graph"
    )
    .version(options.version);

  addConnectionOptions(
    program
      .command("export", { isDefault: true })
      .description("authenticate, fetch all three collections and write the bundle")
  )
    .option("-k, --keyword <text>", "inbox subject filter [OUTLOOK_INBOX_KEYWORD]")
    .option(
      "-o, --output <path>",
      `bundle path [OUTLOOK_OUTPUT_PATH] (default: ${DEFAULT_OUTPUT_PATH})`
    )
    .option("--page-size <n>", "$top per request [OUTLOOK_PAGE_SIZE]")
    .option("--max-pages <n>", "nextLink limit per collection [OUTLOOK_MAX_PAGES]")
    .option(
      "--concurrent",
      "fetch the three collections in parallel [OUTLOOK_CONCURRENT_FETCH]"
    )
    .action(async (opts: ExportOptions) => {
      const config = resolveConfig(opts, env);
      if (!config) return;

      const report = await runExport(config);
      if (report.status === "failed") {
        console.error(
          `[${APP_NAME}] Export failed at "${report.step}": ${report.error.message}`
        );
        process.exitCode = 1;
        return;
      }

      const { inbox_emails, sent_emails, calendar_events } = report.totals;
      console.log(
        `Exported ${inbox_emails} inbox emails, ${sent_emails} sent emails and ${calendar_events} calendar events to ${report.outputPath}`
      );
    });

  program
    .command("normalize")
    .description("flatten an exported bundle into one row per message or event")
    .option("-i, --input <path>", "exported bundle", DEFAULT_OUTPUT_PATH)
    .option("-o, --output <path>", "CSV output", DEFAULT_NORMALIZED_CSV_PATH)
    .option(
      "--output-json <path>",
      "JSON rows output",
      DEFAULT_NORMALIZED_JSON_PATH
    )
    .option("--no-output-json", "skip the JSON rows output")
    .action(async (opts: NormalizeOptions) => {
      const bundle = await readBundle(opts.input);
      if (!bundle.success) {
        console.error(`[${APP_NAME}] ${bundle.error.message}`);
        process.exitCode = 1;
        return;
      }

      const rows = normalizeBundle(bundle.data);
      const jsonPath = opts.outputJson === false ? undefined : opts.outputJson;
      const written = await writeNormalized(rows, {
        csvPath: opts.output,
        jsonPath,
      });
      if (!written.success) {
        console.error(`[${APP_NAME}] ${written.error.message}`);
        process.exitCode = 1;
        return;
      }

      console.log(`Processed rows: ${rows.length}`);
      console.log(`Saved CSV: ${opts.output}`);
      if (jsonPath) {
        console.log(`Saved JSON: ${jsonPath}`);
      }
    });

  addConnectionOptions(
    program
      .command("serve")
      .description("run the MCP server on stdio")
  ).action(async (opts: ConnectionOptions) => {
    const config = resolveConfig(opts, env);
    if (!config) return;

    console.error(
      `[${APP_NAME}] Starting server v${options.version} (stdio transport)...`
    );
    await startStdioServer(createServer(config, options.version));
  });

  return program;
}
