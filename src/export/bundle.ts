/**
 * Result Bundle
 *
 * The single JSON document an export run produces: the three collections,
 * their counts and the retrieval time.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { GraphRecord } from "../outlook/graph-types.js";
import { ExportError, type OutlookResult } from "../outlook/types.js";

export interface BundleTotals {
  inbox_emails: number;
  sent_emails: number;
  calendar_events: number;
}

export interface ResultBundle {
  readonly retrieval_timestamp: string;
  readonly total_items: Readonly<BundleTotals>;
  readonly inbox_emails: readonly GraphRecord[];
  readonly sent_emails: readonly GraphRecord[];
  readonly calendar_events: readonly GraphRecord[];
}

const RecordSchema = z.record(z.unknown());

const ResultBundleSchema = z.object({
  retrieval_timestamp: z.string(),
  total_items: z.object({
    inbox_emails: z.number().int().nonnegative(),
    sent_emails: z.number().int().nonnegative(),
    calendar_events: z.number().int().nonnegative(),
  }),
  inbox_emails: z.array(RecordSchema),
  sent_emails: z.array(RecordSchema),
  calendar_events: z.array(RecordSchema),
});

/**
 * Assemble a frozen bundle. Records are kept in the order given.
 */
export function buildResultBundle(
  inbox: readonly GraphRecord[],
  sent: readonly GraphRecord[],
  calendar: readonly GraphRecord[],
  now: () => Date = () => new Date()
): ResultBundle {
  return Object.freeze({
    retrieval_timestamp: now().toISOString(),
    total_items: Object.freeze({
      inbox_emails: inbox.length,
      sent_emails: sent.length,
      calendar_events: calendar.length,
    }),
    inbox_emails: Object.freeze([...inbox]),
    sent_emails: Object.freeze([...sent]),
    calendar_events: Object.freeze([...calendar]),
  });
}

/** Two-space indented JSON with a trailing newline. */
export function serializeBundle(bundle: ResultBundle): string {
  return `${JSON.stringify(bundle, null, 2)}\n`;
}

/**
 * Write a bundle to disk, replacing any existing file at the path.
 */
export async function exportBundle(
  bundle: ResultBundle,
  destinationPath: string
): Promise<OutlookResult<void, ExportError>> {
  return writeTextFile(destinationPath, serializeBundle(bundle));
}

/**
 * Read and validate a previously exported bundle.
 */
export async function readBundle(
  sourcePath: string
): Promise<OutlookResult<ResultBundle, ExportError>> {
  let text: string;
  try {
    text = await readFile(sourcePath, "utf-8");
  } catch (error) {
    return {
      success: false,
      error: new ExportError(
        `Could not read ${sourcePath}: ${describeFsError(error)}`,
        "READ_FAILED",
        sourcePath
      ),
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return {
      success: false,
      error: new ExportError(
        `${sourcePath} is not valid JSON`,
        "INVALID_INPUT",
        sourcePath
      ),
    };
  }

  const parsed = ResultBundleSchema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      error: new ExportError(
        `${sourcePath} is not an exported bundle: ${parsed.error.message}`,
        "INVALID_INPUT",
        sourcePath
      ),
    };
  }

  return { success: true, data: parsed.data };
}

/** Write UTF-8 text, creating parent directories as needed. */
export async function writeTextFile(
  destinationPath: string,
  content: string
): Promise<OutlookResult<void, ExportError>> {
  try {
    await mkdir(path.dirname(path.resolve(destinationPath)), {
      recursive: true,
    });
    await writeFile(destinationPath, content, "utf-8");
  } catch (error) {
    return {
      success: false,
      error: new ExportError(
        `Could not write ${destinationPath}: ${describeFsError(error)}`,
        "WRITE_FAILED",
        destinationPath
      ),
    };
  }

  return { success: true, data: undefined };
}

function describeFsError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
