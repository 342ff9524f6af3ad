import { errorMessage } from "../domain/errors";
import type { ResultRecord } from "../domain/types";
import { fetchExtrinsic, type ClientOptions } from "../subscan/client";
import { extractRecord } from "../subscan/extract";
import { NETWORKS } from "../subscan/networks";

export type BatchOptions = ClientOptions & {
  delayMs: number; // pause between two requests
  onProgress?: (done: number, total: number, record: ResultRecord) => void;
};

/** Fetch and extract one hash. Never throws: failures become the status. */
export async function lookupRow(
  txHash: string,
  options: ClientOptions,
): Promise<ResultRecord> {
  if (!txHash) return { txHash, status: "Not Found" };

  try {
    const result = await fetchExtrinsic(txHash, options);
    switch (result.kind) {
      case "found":
        return extractRecord(
          txHash,
          result.extrinsic,
          NETWORKS[options.network],
        );
      case "not_found":
        return { txHash, status: "Not Found" };
      case "api_error":
        return { txHash, status: `API Error: ${result.message}` };
    }
  } catch (error) {
    return { txHash, status: `Error: ${errorMessage(error)}` };
  }
}

/** Look up every hash in order, one request at a time */
export async function fetchBatch(
  hashes: ReadonlyArray<string>,
  { delayMs, onProgress, ...clientOptions }: BatchOptions,
): Promise<ResultRecord[]> {
  const results: ResultRecord[] = [];

  for (let i = 0; i < hashes.length; i++) {
    const record = await lookupRow(hashes[i], clientOptions);
    results.push(record);
    onProgress?.(i + 1, hashes.length, record);

    if (delayMs > 0 && i < hashes.length - 1) {
      await new Promise((resolve) => setTimeout(resolve, delayMs)); // Rate limit API
    }
  }

  return results;
}
