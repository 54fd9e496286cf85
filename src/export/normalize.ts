/**
 * Bundle Normalization
 *
 * Flattens an exported bundle into one row per message or event, with the
 * sender, recipients, date and body pulled out of Graph's nested shapes.
 * Rows go out as CSV and as a JSON array.
 */

import { SUMMARY_WORD_LIMIT } from "../constants.js";
import type { GraphRecord } from "../outlook/graph-types.js";
import type { ExportError, OutlookResult } from "../outlook/types.js";
import type { ResultBundle } from "./bundle.js";
import { writeTextFile } from "./bundle.js";
import { toCsv } from "./csv.js";

export type RecordType = "inbox" | "sent" | "event";

export interface NormalizedRow {
  id: string;
  record_type: RecordType;
  sender_name: string;
  sender_address: string;
  recipient_name: string;
  recipient_address: string;
  subject: string;
  date: string;
  body_content: string;
  has_attachment: boolean;
  attachment_names: string[];
  is_flagged: boolean;
  communication_flow: string;
  summary: string;
}

export const NORMALIZED_COLUMNS = [
  "id",
  "record_type",
  "sender_name",
  "sender_address",
  "recipient_name",
  "recipient_address",
  "subject",
  "date",
  "body_content",
  "has_attachment",
  "attachment_names",
  "is_flagged",
  "communication_flow",
  "summary",
] as const satisfies readonly (keyof NormalizedRow)[];

type BundleCollections = Pick<
  ResultBundle,
  "inbox_emails" | "sent_emails" | "calendar_events"
>;

interface NameAddress {
  name: string;
  address: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/** Name and address of a recipient, or of a bare emailAddress object. */
export function extractNameAddress(entity: unknown): NameAddress {
  if (!isObject(entity)) {
    return { name: "", address: "" };
  }

  const info: unknown =
    "emailAddress" in entity ? entity["emailAddress"] : entity;
  if (!isObject(info)) {
    return { name: "", address: "" };
  }

  return {
    name: stringField(info, "name"),
    address: stringField(info, "address"),
  };
}

/** Messages use `from`; events use `organizer`. */
export function extractSender(record: GraphRecord): NameAddress {
  if (record["from"]) {
    return extractNameAddress(record["from"]);
  }
  if (record["organizer"]) {
    return extractNameAddress(record["organizer"]);
  }
  return { name: "", address: "" };
}

/** Messages use `toRecipients`; events use `attendees`. */
export function extractRecipients(record: GraphRecord): NameAddress {
  const recipients: unknown = record["toRecipients"];
  const attendees: unknown = record["attendees"];
  const list: unknown[] = Array.isArray(recipients)
    ? recipients
    : Array.isArray(attendees)
      ? attendees
      : [];

  const names: string[] = [];
  const addresses: string[] = [];
  for (const entry of list) {
    const { name, address } = extractNameAddress(entry);
    if (name) names.push(name);
    if (address) addresses.push(address);
  }

  return { name: names.join("; "), address: addresses.join("; ") };
}

/** receivedDateTime, then sentDateTime, then the event's start. */
export function extractDate(record: GraphRecord): string {
  for (const key of ["receivedDateTime", "sentDateTime"]) {
    const value = stringField(record, key);
    if (value) return value;
  }

  const start = record["start"];
  return isObject(start) ? stringField(start, "dateTime") : "";
}

/** bodyPreview, falling back to body.content. */
export function extractBody(record: GraphRecord): string {
  const preview = stringField(record, "bodyPreview");
  if (preview) return preview;

  const body = record["body"];
  return isObject(body) ? stringField(body, "content") : "";
}

export function extractAttachmentNames(record: GraphRecord): string[] {
  const attachments: unknown = record["attachments"];
  if (!Array.isArray(attachments)) {
    return [];
  }

  const list: unknown[] = attachments;
  const names: string[] = [];
  for (const attachment of list) {
    if (isObject(attachment)) {
      const name = stringField(attachment, "name");
      if (name) names.push(name);
    }
  }
  return names;
}

/** Graph reports `flag.flagStatus`: notFlagged | complete | flagged */
export function extractIsFlagged(record: GraphRecord): boolean {
  const flag = record["flag"];
  if (!isObject(flag)) {
    return false;
  }
  const status = stringField(flag, "flagStatus") || stringField(flag, "status");
  return status.toLowerCase() === "flagged";
}

export function firstWords(text: string, limit: number): string {
  return text.split(/\s+/).filter(Boolean).slice(0, limit).join(" ");
}

/** Build the flat row for one record. */
export function normalizeRecord(
  record: GraphRecord,
  recordType: RecordType
): NormalizedRow {
  const sender = extractSender(record);
  const recipient = extractRecipients(record);
  const subject = stringField(record, "subject");
  const body = extractBody(record);

  const flow =
    `From: ${sender.name || sender.address} To: ${recipient.name || recipient.address}`.trim();
  const snippet = firstWords(body, SUMMARY_WORD_LIMIT);
  const summary = snippet
    ? `${subject.trim()} | ${snippet}`.trim()
    : subject.trim();

  return {
    id: stringField(record, "id"),
    record_type: recordType,
    sender_name: sender.name,
    sender_address: sender.address,
    recipient_name: recipient.name,
    recipient_address: recipient.address,
    subject: subject.length === 0 ? "(no subject)" : subject,
    date: extractDate(record),
    body_content: body,
    has_attachment: record["hasAttachments"] === true,
    attachment_names: extractAttachmentNames(record),
    is_flagged: extractIsFlagged(record),
    communication_flow: flow,
    summary,
  };
}

/**
 * Flatten a bundle: inbox rows, then sent, then events. Duplicate ids keep
 * their first row; rows without an id are always kept.
 */
export function normalizeBundle(bundle: BundleCollections): NormalizedRow[] {
  const tagged: [RecordType, readonly GraphRecord[]][] = [
    ["inbox", bundle.inbox_emails],
    ["sent", bundle.sent_emails],
    ["event", bundle.calendar_events],
  ];

  const seen = new Set<string>();
  const rows: NormalizedRow[] = [];
  for (const [recordType, records] of tagged) {
    for (const record of records) {
      const row = normalizeRecord(record, recordType);
      if (row.id) {
        if (seen.has(row.id)) continue;
        seen.add(row.id);
      }
      rows.push(row);
    }
  }
  return rows;
}

export function rowsToCsv(rows: readonly NormalizedRow[]): string {
  return toCsv(NORMALIZED_COLUMNS, rows);
}

export interface NormalizedOutputPaths {
  csvPath: string;
  jsonPath?: string | undefined;
}

/** Write the CSV and, when a path is given, the JSON rows. */
export async function writeNormalized(
  rows: readonly NormalizedRow[],
  paths: NormalizedOutputPaths
): Promise<OutlookResult<void, ExportError>> {
  const csvResult = await writeTextFile(paths.csvPath, rowsToCsv(rows));
  if (!csvResult.success || !paths.jsonPath) {
    return csvResult;
  }

  return writeTextFile(paths.jsonPath, `${JSON.stringify(rows, null, 2)}\n`);
}
