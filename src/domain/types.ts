export type RowStatus =
  | "Success"
  | "Not Found"
  | `API Error: ${string}`
  | `Error: ${string}`;

export type ResultRecord = {
  txHash: string;
  status: RowStatus;
  sender?: string; // account that signed the extrinsic
  from?: string;
  to?: string;
  transferAmount?: string; // formatted with symbol, or "N/A"
  estimatedFee?: string;
  usedFee?: string;
};

export type TransferSummary = {
  source: "transfer" | "params" | "none"; // which part of the response answered
  amount: string;
  from?: string;
  to?: string;
};
