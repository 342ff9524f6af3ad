import { parse } from "csv-parse/sync";
import { readFileSync } from "fs";
import { z } from "zod";

const recordsSchema = z.array(z.array(z.string()));

export type HashTable = {
  headers: string[];
  rows: string[][];
};

/** Parse CSV text with a header row */
export function parseHashTable(content: string): HashTable {
  const records = recordsSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  const [headers, ...rows] = records;
  if (!headers || headers.every((h) => h.trim() === "")) {
    throw new Error("Input file has no header row");
  }
  return { headers: headers.map((h) => h.trim()), rows };
}

export function loadHashTable(filePath: string): HashTable {
  return parseHashTable(readFileSync(filePath, "utf8"));
}

/**
 * Pick the column holding the transaction hashes. An explicit name must
 * exist (case-insensitive); otherwise the first header mentioning "hash"
 * is used, else the first column.
 */
export function resolveHashColumn(
  headers: ReadonlyArray<string>,
  requested?: string,
): string {
  if (requested) {
    const wanted = requested.trim().toLowerCase();
    const match = headers.find((h) => h.toLowerCase() === wanted);
    if (!match) {
      throw new Error(
        `Column "${requested}" not found. Available columns: ${headers.join(", ")}`,
      );
    }
    return match;
  }
  return headers.find((h) => /hash/i.test(h)) ?? headers[0];
}

/** Trimmed values of a column, one per data row */
export function columnValues(table: HashTable, column: string): string[] {
  const index = table.headers.indexOf(column);
  if (index === -1) throw new Error(`Column "${column}" not found`);
  return table.rows.map((row) => (row[index] ?? "").trim());
}

/** First rows keyed by header, for console.table */
export function previewRows(
  table: HashTable,
  count = 5,
): Record<string, string>[] {
  return table.rows.slice(0, count).map((row) =>
    Object.fromEntries(table.headers.map((h, i) => [h, row[i] ?? ""])),
  );
}
