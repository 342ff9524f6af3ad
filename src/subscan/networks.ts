export type NativeToken = {
  symbol: string;
  decimals: number;
};

// Subscan subdomains and their native token
export const NETWORK_NAMES = [
  "polkadot",
  "kusama",
  "westend",
  "rococo",
  "paseo",
] as const;

export type Network = (typeof NETWORK_NAMES)[number];

export const NETWORKS: Record<Network, NativeToken> = {
  polkadot: { symbol: "DOT", decimals: 10 },
  kusama: { symbol: "KSM", decimals: 12 },
  westend: { symbol: "WND", decimals: 12 },
  rococo: { symbol: "ROC", decimals: 12 },
  paseo: { symbol: "PAS", decimals: 10 },
};

export const extrinsicEndpoint = (network: Network): string =>
  `https://${network}.api.subscan.io/api/scan/extrinsic`;
