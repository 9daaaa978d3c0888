/**
 * One chain's governance node: stores, services and gateway wired together.
 * Every node owns its own state; nodes only ever talk through the transport.
 */

import { join } from 'node:path';
import { getAddress, type Address, type Hex } from 'viem';
import { createDaoStore, type DaoStore } from '../storage/daoStore.js';
import { createProposalStore, type ProposalStore } from '../storage/proposalStore.js';
import { createOutboxStore, type OutboxStore } from '../storage/outboxStore.js';
import { createEventLog, type EventLog } from '../storage/logStore.js';
import { createFeeLedger, type FeeLedger } from '../services/feeLedger.js';
import type { MembershipOracle } from '../services/membership.js';
import { createDaoRegistry, type DaoRegistry } from '../governance/registry.js';
import { createProposalService, type ProposalService } from '../governance/proposals.js';
import { createVoteAggregator, type VoteAggregator } from '../governance/votes.js';
import { createFinalizationController, type FinalizationController } from '../governance/finalization.js';
import { systemClock, type Clock } from '../governance/types.js';
import { createCrossChainGateway, type CrossChainGateway } from '../crosschain/gateway.js';
import type { TransportFactory } from '../crosschain/transport.js';
import { toBytes32 } from '../lib/hex.js';

export interface ChainNodeOptions {
  chainId: number;
  administrator: Address;
  gatewayAddress: Address;
  membership: MembershipOracle;
  transport: TransportFactory;
  creationFee?: bigint;
  /** domain → remote gateway (20-byte address or bytes32) */
  trustedRemotes?: Iterable<readonly [number, Hex]>;
  clock?: Clock;
  /** Persist stores as JSON files here. In-memory only when unset. */
  stateDir?: string;
  /** JSONL event log; defaults to events.jsonl under stateDir. */
  logFile?: string;
}

export interface ChainNode {
  chainId: number;
  administrator: Address;
  /** bytes32 form of this node's gateway, as remotes must trust it */
  gateway: Hex;
  clock: Clock;
  log: EventLog;
  daos: DaoStore;
  proposalStore: ProposalStore;
  outbox: OutboxStore;
  fees: FeeLedger;
  registry: DaoRegistry;
  proposals: ProposalService;
  votes: VoteAggregator;
  finalization: FinalizationController;
  crosschain: CrossChainGateway;
}

/**
 * Outbox nonce base for this boot: clock seconds in the high bits, leaving
 * 2^24 votes per destination per second of uptime before two boots overlap.
 */
function bootEpoch(clock: Clock): bigint {
  return BigInt(Math.floor(clock())) << 24n;
}

export function createChainNode(options: ChainNodeOptions): ChainNode {
  const { chainId, stateDir } = options;
  const clock = options.clock ?? systemClock;
  const administrator = getAddress(options.administrator);
  const gateway = toBytes32(options.gatewayAddress);
  const stateFile = (name: string): string | undefined => (stateDir ? join(stateDir, name) : undefined);

  const log = createEventLog({ chainId, file: options.logFile ?? stateFile('events.jsonl') });
  const daos = createDaoStore({ file: stateFile('daos.json') });
  const proposalStore = createProposalStore({ file: stateFile('proposals.json') });
  const outbox = createOutboxStore({ file: stateFile('outbox.json'), epoch: bootEpoch(clock) });
  const fees = createFeeLedger({
    administrator,
    creationFee: options.creationFee ?? 0n,
    log,
    file: stateFile('fees.json'),
  });

  const registry = createDaoRegistry({ daos, fees, log, clock, administrator });
  const proposals = createProposalService({ daos, proposals: proposalStore, log, clock });
  const votes = createVoteAggregator({
    daos,
    proposals: proposalStore,
    membership: options.membership,
    log,
    clock,
  });
  const finalization = createFinalizationController({ daos, proposals: proposalStore, log, clock });

  // The transport needs the inbound handler and the gateway needs the
  // transport; the handler resolves the gateway when a delivery arrives.
  let crosschain: CrossChainGateway | undefined;
  const transport = options.transport({ domain: chainId, gateway }, async (delivery) => {
    if (!crosschain) throw new Error(`[node ${chainId}] delivery before the gateway was ready`);
    return crosschain.handleInbound(delivery);
  });
  crosschain = createCrossChainGateway({
    domain: chainId,
    trustedRemotes: new Map(options.trustedRemotes ?? []),
    transport,
    outbox,
    daos,
    proposals,
    votes,
    finalization,
    log,
  });

  console.log(
    `[node] chain ${chainId} ready (gateway ${gateway}, ${crosschain.remotes().size} trusted remote(s)${
      stateDir ? `, state in ${stateDir}` : ''
    })`,
  );

  return {
    chainId,
    administrator,
    gateway,
    clock,
    log,
    daos,
    proposalStore,
    outbox,
    fees,
    registry,
    proposals,
    votes,
    finalization,
    crosschain,
  };
}
