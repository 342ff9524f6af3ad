import { extrinsicEndpoint, type Network } from "./networks";
import { envelopeSchema, type Extrinsic } from "./schema";

export const DEFAULT_TIMEOUT_MS = 30_000;
const USER_AGENT = "extrinsic-export/1.0 (+node)";

export type ClientOptions = {
  network: Network;
  apiKey?: string; // sent as X-API-Key, raises the rate limit
  timeoutMs?: number;
};

export type LookupResult =
  | { kind: "found"; extrinsic: Extrinsic }
  | { kind: "not_found" }
  | { kind: "api_error"; message: string };

/** Body as JSON, or undefined when it is not JSON (e.g. a proxy error page) */
async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Look up a single extrinsic by hash. Transport failures and timeouts are
 * thrown; anything the API answers is returned as a LookupResult.
 */
export async function fetchExtrinsic(
  hash: string,
  { network, apiKey, timeoutMs = DEFAULT_TIMEOUT_MS }: ClientOptions,
): Promise<LookupResult> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "User-Agent": USER_AGENT,
  };
  if (apiKey) headers["X-API-Key"] = apiKey;

  const res = await fetch(extrinsicEndpoint(network), {
    method: "POST",
    headers,
    body: JSON.stringify({ hash }),
    signal: AbortSignal.timeout(timeoutMs),
  });

  const body = await readJson(res);
  if (body === undefined) {
    return {
      kind: "api_error",
      message: res.ok ? "Invalid JSON response" : `HTTP ${res.status}`,
    };
  }

  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    return {
      kind: "api_error",
      message: res.ok ? "Unexpected response shape" : `HTTP ${res.status}`,
    };
  }

  const { message, data } = parsed.data;
  if (!res.ok || message !== "Success") {
    return { kind: "api_error", message: message || "Unknown" };
  }
  if (!data || Object.keys(data).length === 0) {
    return { kind: "not_found" };
  }
  return { kind: "found", extrinsic: data };
}
