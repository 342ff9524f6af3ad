import { formatAmount, toDecimals } from "../domain/units";
import type { ResultRecord, TransferSummary } from "../domain/types";
import type { NativeToken } from "./networks";
import type { Extrinsic, ExtrinsicParam } from "./schema";

export const NOT_AVAILABLE = "N/A";

/**
 * Resolve an account from a call parameter. MultiAddress values come as
 * `{ Id: "1abc..." }`, plain accounts as strings.
 */
export function extractAddress(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") return value;
  if (typeof value !== "object") return String(value);

  if ("Id" in value && value.Id !== null && value.Id !== undefined) {
    return extractAddress(value.Id);
  }
  if ("id" in value && value.id !== null && value.id !== undefined) {
    return extractAddress(value.id);
  }
  return JSON.stringify(value);
}

const isEmpty = (value: object): boolean => Object.keys(value).length === 0;

/** Account that signed the extrinsic */
export const senderOf = (extrinsic: Extrinsic): string | undefined =>
  extrinsic.account_id || extrinsic.account_display?.address || undefined;

const findParam = (
  params: ReadonlyArray<ExtrinsicParam>,
  name: string,
): ExtrinsicParam | undefined => params.find((p) => p.name === name);

/**
 * Work out amount and parties of a transfer. The `transfer` object wins when
 * present; otherwise the call params `value` and `dest` are used, with the
 * signer as sender.
 */
export function extractTransfer(
  extrinsic: Extrinsic,
  native: NativeToken,
): TransferSummary {
  const sender = senderOf(extrinsic);
  const { transfer } = extrinsic;

  if (transfer && !isEmpty(transfer)) {
    const decimals = toDecimals(transfer.decimals, native.decimals);
    const symbol = transfer.symbol || native.symbol;
    return {
      source: "transfer",
      amount: formatAmount(transfer.amount, decimals, symbol) ?? NOT_AVAILABLE,
      from: transfer.from || sender,
      to: transfer.to || undefined,
    };
  }

  const params = extrinsic.params ?? [];
  const value = findParam(params, "value");
  const dest = findParam(params, "dest");
  if (!value && !dest) {
    return { source: "none", amount: NOT_AVAILABLE, from: sender };
  }

  const amount = value
    ? formatAmount(value.value, native.decimals, native.symbol)
    : undefined;
  return {
    source: "params",
    amount: amount ?? NOT_AVAILABLE,
    from: sender,
    to: dest ? extractAddress(dest.value) : undefined,
  };
}

const formatFee = (raw: unknown, native: NativeToken): string | undefined =>
  formatAmount(raw ?? "0", native.decimals, native.symbol, { trim: true });

/** Build the result row for an extrinsic the API found */
export function extractRecord(
  txHash: string,
  extrinsic: Extrinsic,
  native: NativeToken,
): ResultRecord {
  const { amount, from, to } = extractTransfer(extrinsic, native);
  return {
    txHash,
    status: "Success",
    sender: senderOf(extrinsic),
    from,
    to,
    transferAmount: amount,
    estimatedFee: formatFee(extrinsic.fee, native),
    usedFee: formatFee(extrinsic.fee_used, native),
  };
}
