import { Router } from 'express';
import { ZERO_ADDRESS, chainName } from '@crossvote/shared';
import type { ChainNode } from '../chain/node.js';
import { amount } from '../lib/hex.js';

export interface HealthInfo {
  name?: string;
  strictMode?: boolean;
  version?: string;
}

/** Mask an address to first 6 + last 4 chars for public display. */
function maskAddress(addr: string): string {
  if (!addr || addr === ZERO_ADDRESS) return '(not configured)';
  if (addr.length < 12) return addr;
  return `${addr.slice(0, 6)}…${addr.slice(-4)}`;
}

export function createHealthRouter(node: ChainNode, info: HealthInfo = {}): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const remotes = node.crosschain.remotes();
    const configured = {
      administrator: node.administrator !== ZERO_ADDRESS,
      administratorMasked: maskAddress(node.administrator),
      gateway: BigInt(node.gateway) !== 0n,
      trustedRemotesCount: remotes.size,
    };
    const ok = configured.administrator && configured.gateway && remotes.size > 0;

    res.json({
      status: ok ? 'ok' : 'degraded',
      uptime: process.uptime(),
      service: 'crossvote-node',
      timestamp: new Date().toISOString(),
      version: info.version ?? '0.1.0',
      chain: { chainId: node.chainId, name: info.name ?? chainName(node.chainId) },
      strictMode: info.strictMode ?? false,
      configured,
    });
  });

  // ─── Status (quick liveness + counters) ──────────────────
  router.get('/status', (_req, res) => {
    const proposals = node.proposals.list();
    res.json({
      alive: true,
      uptime: process.uptime(),
      chainId: node.chainId,
      daosCount: node.daos.list().length,
      proposalsCount: proposals.length,
      activeProposals: proposals.filter((p) => p.state === 'ACTIVE').length,
      eventsCount: node.log.readLatest(Number.MAX_SAFE_INTEGER).length,
      feeBalance: amount(node.fees.balance()),
    });
  });

  return router;
}
