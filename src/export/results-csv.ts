import { stringify } from "csv-stringify/sync";
import { writeFileSync } from "fs";
import type { ResultRecord } from "../domain/types";

export const RESULT_COLUMNS = [
  "Tx Hash",
  "Status",
  "Sender",
  "From",
  "To",
  "Transfer Amount",
  "Estimated Fee",
  "Used Fee",
] as const;

export type ResultRow = Record<(typeof RESULT_COLUMNS)[number], string>;

/** Flatten a record into export columns; absent values become empty cells */
export const toResultRow = (record: ResultRecord): ResultRow => ({
  "Tx Hash": record.txHash,
  Status: record.status,
  Sender: record.sender ?? "",
  From: record.from ?? "",
  To: record.to ?? "",
  "Transfer Amount": record.transferAmount ?? "",
  "Estimated Fee": record.estimatedFee ?? "",
  "Used Fee": record.usedFee ?? "",
});

export const buildResultsCsv = (records: ReadonlyArray<ResultRecord>) =>
  stringify(records.map(toResultRow), {
    header: true,
    columns: [...RESULT_COLUMNS],
  });

export function writeResultsCsvFile(
  records: ReadonlyArray<ResultRecord>,
  filePath: string,
): void {
  const csv = buildResultsCsv(records);
  writeFileSync(filePath, csv, "utf8");
  console.log(`Wrote ${filePath}`);
}
