/**
 * CSV Formatting
 *
 * Minimal RFC 4180 writer for flat rows of primitive values.
 */

export type CsvValue = string | number | boolean | readonly string[];

/** Quote a field when it contains a comma, quote, CR or LF. */
export function escapeCsvField(value: CsvValue): string {
  const text = Array.isArray(value) ? value.join("; ") : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render rows as CSV with a header line. Columns follow `columns` order;
 * every line ends with `\n`.
 */
export function toCsv<K extends string>(
  columns: readonly K[],
  rows: readonly Readonly<Record<K, CsvValue>>[]
): string {
  const lines = [columns.map((column) => escapeCsvField(column)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}
