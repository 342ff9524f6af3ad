#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config";
import { errorMessage } from "./domain/errors";
import { fetchBatch } from "./batch/fetch-batch";
import {
  columnValues,
  loadHashTable,
  previewRows,
  resolveHashColumn,
} from "./input/hash-csv";
import { toResultRow, writeResultsCsvFile } from "./export/results-csv";

// Look up fees and transfers for every extrinsic hash in a CSV file
export async function main() {
  try {
    const config = loadConfig(process.argv.slice(2));

    const table = loadHashTable(config.inputFile);
    console.log(`Loaded ${table.rows.length} rows from ${config.inputFile}`);
    console.table(previewRows(table));

    const column = resolveHashColumn(table.headers, config.hashColumn);
    if (!config.hashColumn) {
      console.warn(`No hash column given, using "${column}"`);
    }
    const hashes = columnValues(table, column);

    console.log(
      `Fetching ${hashes.length} extrinsics from ${config.network}...`,
    );
    const results = await fetchBatch(hashes, {
      network: config.network,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      delayMs: config.delayMs,
      onProgress: (done, total, record) =>
        console.log(`Processing ${done}/${total}... ${record.status}`),
    });
    console.log("Processing complete!");

    console.table(results.map(toResultRow));
    writeResultsCsvFile(results, config.outputFile);
  } catch (error) {
    console.error("Error:", errorMessage(error));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
