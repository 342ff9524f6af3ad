import { z } from "zod";
import { DEFAULT_TIMEOUT_MS } from "./subscan/client";
import { NETWORK_NAMES, type Network } from "./subscan/networks";

const envSchema = z.object({
  SUBSCAN_API_KEY: z.string().trim().optional(),
  SUBSCAN_NETWORK: z.enum(NETWORK_NAMES).default("polkadot"),
  REQUEST_DELAY_MS: z.coerce.number().int().min(100).max(2000).default(400),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUT_MS),
  OUTPUT_FILE: z.string().trim().min(1).optional(),
});

export type Config = {
  inputFile: string;
  hashColumn?: string;
  apiKey?: string;
  network: Network;
  delayMs: number;
  timeoutMs: number;
  outputFile: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Build the run configuration from CLI arguments and the environment */
export function loadConfig(
  args: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const [inputFile, hashColumn] = args;
  if (!inputFile) {
    throw new ConfigError("Usage: extrinsic-export <input.csv> [hash-column]");
  }

  // Unset and empty variables both mean "use the default"
  const defined = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== "",
    ),
  );
  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const e = parsed.data;
  return {
    inputFile,
    hashColumn: hashColumn || undefined,
    apiKey: e.SUBSCAN_API_KEY || undefined,
    network: e.SUBSCAN_NETWORK,
    delayMs: e.REQUEST_DELAY_MS,
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    outputFile: e.OUTPUT_FILE ?? `${e.SUBSCAN_NETWORK}_data_captured.csv`,
  };
}
