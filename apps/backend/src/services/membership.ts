/**
 * Membership oracle: whitelist gate plus governance-token balances.
 *
 * Two sources:
 *   static:  in-memory whitelist and balance table (config / tests)
 *   onchain: reads a whitelist contract and the ERC-20 token over RPC
 */

import { createPublicClient, getAddress, http, type Address } from 'viem';

export interface MembershipOracle {
  isWhitelisted(voter: Address): Promise<boolean>;
  balanceOf(token: Address, holder: Address): Promise<bigint>;
}

export interface StaticMembershipOracle extends MembershipOracle {
  setWhitelisted(voter: Address, allowed: boolean): void;
  setBalance(token: Address, holder: Address, balance: bigint): void;
}

export interface BalanceEntry {
  token: Address;
  holder: Address;
  amount: bigint;
}

function balanceKey(token: Address, holder: Address): string {
  return `${getAddress(token)}:${getAddress(holder)}`;
}

export function createStaticMembershipOracle(
  seed: { whitelist?: Address[]; balances?: BalanceEntry[] } = {},
): StaticMembershipOracle {
  const whitelist = new Set<Address>((seed.whitelist ?? []).map((a) => getAddress(a)));
  const balances = new Map<string, bigint>();
  for (const entry of seed.balances ?? []) {
    balances.set(balanceKey(entry.token, entry.holder), entry.amount);
  }

  return {
    isWhitelisted: async (voter) => whitelist.has(getAddress(voter)),
    balanceOf: async (token, holder) => balances.get(balanceKey(token, holder)) ?? 0n,
    setWhitelisted(voter, allowed) {
      if (allowed) whitelist.add(getAddress(voter));
      else whitelist.delete(getAddress(voter));
    },
    setBalance(token, holder, balance) {
      balances.set(balanceKey(token, holder), balance);
    },
  };
}

// ─── On-chain source ─────────────────────────────────────

const WHITELIST_ABI = [
  {
    name: 'isWhitelisted',
    type: 'function',
    stateMutability: 'view',
    inputs: [{ name: 'account', type: 'address' }],
    outputs: [{ name: '', type: 'bool' }],
  },
] as const;

const ERC20_BALANCE_ABI = [
  {
    name: 'balanceOf',
    type: 'function',
    stateMutability: 'view',
    inputs: [{ name: 'account', type: 'address' }],
    outputs: [{ name: '', type: 'uint256' }],
  },
] as const;

export function createOnchainMembershipOracle(options: {
  rpcUrl: string;
  whitelistContract: Address;
}): MembershipOracle {
  const client = createPublicClient({ transport: http(options.rpcUrl) });

  return {
    isWhitelisted: (voter) =>
      client.readContract({
        address: options.whitelistContract,
        abi: WHITELIST_ABI,
        functionName: 'isWhitelisted',
        args: [voter],
      }),
    balanceOf: (token, holder) =>
      client.readContract({
        address: token,
        abi: ERC20_BALANCE_ABI,
        functionName: 'balanceOf',
        args: [holder],
      }),
  };
}
