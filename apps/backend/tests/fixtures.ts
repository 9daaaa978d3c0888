/**
 * Shared test fixtures: placeholder identities, a hand-driven clock and
 * a node factory wired to the static membership oracle.
 * Addresses are digit-only so their checksum form equals the literal.
 */

import type { Address, Hex } from 'viem';
import { createChainNode, type ChainNode } from '../src/chain/node.js';
import { createLoopbackHub, type TransportFactory } from '../src/crosschain/transport.js';
import { createStaticMembershipOracle, type StaticMembershipOracle } from '../src/services/membership.js';
import type { Clock } from '../src/governance/types.js';

export const ADMIN: Address = '0x1000000000000000000000000000000000000001';
export const CONTROLLER: Address = '0x2000000000000000000000000000000000000002';
export const VOTER: Address = '0x3000000000000000000000000000000000000003';
export const VOTER_2: Address = '0x3000000000000000000000000000000000000004';
export const OUTSIDER: Address = '0x4000000000000000000000000000000000000004';
export const TOKEN: Address = '0x5000000000000000000000000000000000000005';
export const GATEWAY_A: Address = '0x6000000000000000000000000000000000000006';
export const GATEWAY_B: Address = '0x7000000000000000000000000000000000000007';

export const DOMAIN_A = 31337;
export const DOMAIN_B = 31338;

export const DAO_1: Hex = `0x${'1'.repeat(64)}`;
export const DAO_2: Hex = `0x${'3'.repeat(64)}`;
export const PROPOSAL_1: Hex = `0x${'2'.repeat(64)}`;
export const PROPOSAL_2: Hex = `0x${'4'.repeat(64)}`;

/** Left-padded bytes32 form of a digit-only address. */
export function padded(address: Address): Hex {
  return `0x${'0'.repeat(24)}${address.slice(2)}`;
}

export interface ManualClock {
  clock: Clock;
  set(now: number): void;
}

export function manualClock(start = 0): ManualClock {
  let now = start;
  return {
    clock: () => now,
    set(next) {
      now = next;
    },
  };
}

export interface TestNode {
  node: ChainNode;
  membership: StaticMembershipOracle;
  time: ManualClock;
}

/**
 * VOTER is whitelisted with 150 TOKEN, VOTER_2 with 1000 TOKEN.
 * OUTSIDER is not whitelisted.
 */
export function makeNode(
  options: {
    chainId?: number;
    gatewayAddress?: Address;
    transport?: TransportFactory;
    trustedRemotes?: Array<[number, Hex]>;
    creationFee?: bigint;
    stateDir?: string;
    start?: number;
  } = {},
): TestNode {
  const time = manualClock(options.start ?? 0);
  const membership = createStaticMembershipOracle({
    whitelist: [VOTER, VOTER_2],
    balances: [
      { token: TOKEN, holder: VOTER, amount: 150n },
      { token: TOKEN, holder: VOTER_2, amount: 1000n },
    ],
  });
  const node = createChainNode({
    chainId: options.chainId ?? DOMAIN_A,
    administrator: ADMIN,
    gatewayAddress: options.gatewayAddress ?? GATEWAY_A,
    membership,
    transport: options.transport ?? createLoopbackHub().factory,
    creationFee: options.creationFee,
    trustedRemotes: options.trustedRemotes,
    clock: time.clock,
    stateDir: options.stateDir,
  });
  return { node, membership, time };
}

/** Registers DAO_1 (controller CONTROLLER, token TOKEN, minimumTokens 100). */
export function registerDao(node: ChainNode, id: Hex = DAO_1, controller: Address = CONTROLLER): void {
  const result = node.registry.register(
    controller,
    {
      id,
      name: 'Test DAO',
      description: 'placeholder',
      metadataRef: 'ipfs://placeholder',
      governanceToken: TOKEN,
      minimumTokens: 100n,
    },
    node.registry.getCreationFee(),
  );
  if (!result.ok) throw new Error(`fixture registration failed: ${result.code}`);
}

/** Creates PROPOSAL_1 on DAO_1: window [100, 200], quorum 1000. */
export function createProposal(node: ChainNode, id: Hex = PROPOSAL_1, daoId: Hex = DAO_1): void {
  const result = node.proposals.create(
    { kind: 'caller', address: CONTROLLER },
    { daoId, proposalId: id, description: 'Fund the placeholder', start: 100, end: 200, quorum: 1000n },
  );
  if (!result.ok) throw new Error(`fixture proposal failed: ${result.code}`);
}
