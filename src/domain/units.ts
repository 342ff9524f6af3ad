export const DEFAULT_DECIMALS = 10; // DOT has 10 decimal places
export const DEFAULT_PRECISION = 4;
export const MAX_DECIMALS = 64; // anything larger is a malformed response

// Base-unit amounts come as integer strings, sometimes with a trailing ".0"
const RAW_AMOUNT = /^-?\d+(\.\d*)?$/;

export type AmountFormat = {
  precision?: number; // fixed number of decimal places, rounded half-up
  trim?: boolean; // keep every significant digit, drop trailing zeros
};

// Convert a raw amount to BigInt base units, undefined if it is not numeric.
export const toBaseUnits = (raw: unknown): bigint | undefined => {
  if (typeof raw === "bigint") return raw;
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return undefined;
    return BigInt(Math.trunc(raw));
  }
  if (typeof raw !== "string") return undefined;

  const clean = raw.trim();
  if (!RAW_AMOUNT.test(clean)) return undefined;

  // Fractions of a base unit are dropped
  return BigInt(clean.split(".")[0]);
};

/** Read a decimals field that may be a number or a numeric string */
export const toDecimals = (raw: unknown, fallback: number): number => {
  if (typeof raw === "number" && Number.isInteger(raw) && raw >= 0) {
    return raw;
  }
  if (typeof raw === "string" && /^\d+$/.test(raw.trim())) {
    return Number(raw.trim());
  }
  return fallback;
};

const groupThousands = (integer: bigint): string =>
  integer.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ",");

/** Scale base units down by 10^decimals and render them as a decimal string */
export const formatUnits = (
  units: bigint,
  decimals: number,
  { precision = DEFAULT_PRECISION, trim = false }: AmountFormat = {},
): string => {
  const digits = trim ? decimals : precision;
  const abs = units < 0n ? -units : units;

  let scaled: bigint;
  if (digits >= decimals) {
    scaled = abs * 10n ** BigInt(digits - decimals);
  } else {
    const divisor = 10n ** BigInt(decimals - digits);
    scaled = (abs + divisor / 2n) / divisor;
  }

  const base = 10n ** BigInt(digits);
  const integer = groupThousands(scaled / base);
  let fraction =
    digits > 0 ? (scaled % base).toString().padStart(digits, "0") : "";
  if (trim) fraction = fraction.replace(/0+$/, "");

  const sign = units < 0n && scaled > 0n ? "-" : "";
  return fraction ? `${sign}${integer}.${fraction}` : `${sign}${integer}`;
};

/**
 * Format a raw fixed-point amount as a human readable value, e.g.
 * `formatAmount("124670000000000", 10, "DOT")` is `"12,467.0000 DOT"`.
 * Returns undefined when the amount or the decimals are not numeric, or the
 * decimals exceed MAX_DECIMALS.
 */
export const formatAmount = (
  raw: unknown,
  decimals: number = DEFAULT_DECIMALS,
  symbol?: string,
  format?: AmountFormat,
): string | undefined => {
  if (!Number.isInteger(decimals) || decimals < 0) return undefined;
  if (decimals > MAX_DECIMALS) return undefined;

  const units = toBaseUnits(raw);
  if (units === undefined) return undefined;

  const value = formatUnits(units, decimals, format);
  return symbol ? `${value} ${symbol}` : value;
};
