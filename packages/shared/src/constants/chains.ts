// ─── Chain Configurations ────────────────────────────────

export interface ChainInfo {
  chainId: number;
  name: string;
  isTestnet: boolean;
}

/** Domains the nodes know by name. Unknown ids still work; they just print as numbers. */
export const CHAINS: Record<number, ChainInfo> = {
  1: { chainId: 1, name: 'Ethereum', isTestnet: false },
  10: { chainId: 10, name: 'Optimism', isTestnet: false },
  8453: { chainId: 8453, name: 'Base', isTestnet: false },
  42161: { chainId: 42161, name: 'Arbitrum One', isTestnet: false },
  84532: { chainId: 84532, name: 'Base Sepolia', isTestnet: true },
  11155111: { chainId: 11155111, name: 'Sepolia', isTestnet: true },
  31337: { chainId: 31337, name: 'Local', isTestnet: true },
};

export const DEFAULT_CHAIN_ID = 31337;

export function chainName(chainId: number): string {
  return CHAINS[chainId]?.name ?? `domain ${chainId}`;
}
