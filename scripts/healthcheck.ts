#!/usr/bin/env node
// ─── Integration Health Harness ──────────────────────────
// Validates a running node's API responses against the shared Zod schemas.
//
// Usage:
//   BACKEND_URL=http://localhost:4000 npx tsx scripts/healthcheck.ts
//
// Exit code 0 = all passed, non-zero = failures detected.

import { z } from 'zod';
import {
  DaoSummarySchema,
  ErrorResponseSchema,
  LogEventSchema,
  ProposalSummarySchema,
  ZERO_BYTES32,
  zBytes32,
} from '@crossvote/shared';

const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:4000';
const TIMEOUT_MS = 10_000;

// ─── Test runner ─────────────────────────────────────────

interface TestResult {
  name: string;
  endpoint: string;
  passed: boolean;
  detail?: string;
}

const results: TestResult[] = [];

async function fetchRaw(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
  try {
    const res = await fetch(`${BACKEND_URL}${path}`, {
      ...init,
      signal: controller.signal,
      headers: { 'Content-Type': 'application/json', ...(init?.headers ?? {}) },
    });
    return { status: res.status, body: await res.json() };
  } finally {
    clearTimeout(timer);
  }
}

async function fetchJSON(path: string, init?: RequestInit): Promise<unknown> {
  const { status, body } = await fetchRaw(path, init);
  if (status < 200 || status >= 300) throw new Error(`HTTP ${status}: ${JSON.stringify(body)}`);
  return body;
}

async function runTest(name: string, endpoint: string, fn: () => Promise<void>) {
  try {
    await fn();
    results.push({ name, endpoint, passed: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    results.push({ name, endpoint, passed: false, detail: msg });
  }
}

// ─── Tests ───────────────────────────────────────────────

async function main() {
  console.log(`\n🔍 crossvote node health check`);
  console.log(`   Backend: ${BACKEND_URL}\n`);

  await runTest('Health endpoint', 'GET /health', async () => {
    const data = await fetchJSON('/health');
    z.object({
      status: z.enum(['ok', 'degraded']),
      service: z.string(),
      timestamp: z.string(),
      version: z.string(),
      chain: z.object({ chainId: z.number(), name: z.string() }),
      strictMode: z.boolean(),
    })
      .passthrough()
      .parse(data);
  });

  await runTest('Status endpoint', 'GET /status', async () => {
    const data = await fetchJSON('/status');
    z.object({ alive: z.boolean(), uptime: z.number(), chainId: z.number() }).passthrough().parse(data);
  });

  await runTest('Creation fee', 'GET /api/governance/creation-fee', async () => {
    const data = await fetchJSON('/api/governance/creation-fee');
    z.object({ fee: z.string().regex(/^\d+$/) }).parse(data);
  });

  let firstDaoId: string | undefined;
  await runTest('Governance proposals', 'GET /api/governance/proposals', async () => {
    const data = await fetchJSON('/api/governance/proposals');
    const parsed = z.object({ proposals: z.array(ProposalSummarySchema) }).parse(data);
    firstDaoId = parsed.proposals[0]?.daoId;
  });

  if (firstDaoId) {
    const daoId = firstDaoId;
    await runTest('DAO lookup', 'GET /api/governance/daos/:id', async () => {
      const data = await fetchJSON(`/api/governance/daos/${daoId}`);
      z.object({ dao: DaoSummarySchema }).parse(data);
    });
  }

  await runTest('Unknown proposal error shape', 'GET /api/governance/proposals/:id', async () => {
    const { status, body } = await fetchRaw(`/api/governance/proposals/${ZERO_BYTES32}`);
    if (status !== 404) throw new Error(`expected 404, got ${status}`);
    const parsed = ErrorResponseSchema.parse(body);
    if (parsed.code !== 'PROPOSAL_NOT_FOUND') throw new Error(`unexpected code ${parsed.code}`);
  });

  await runTest('Trusted remotes', 'GET /api/crosschain/remotes', async () => {
    const data = await fetchJSON('/api/crosschain/remotes');
    z.object({
      domain: z.number(),
      gateway: zBytes32,
      remotes: z.array(z.object({ domain: z.number(), name: z.string(), gateway: zBytes32 })),
    }).parse(data);
  });

  await runTest('Event log', 'GET /api/events', async () => {
    const data = await fetchJSON('/api/events?limit=5');
    z.object({ events: z.array(LogEventSchema).max(5) }).parse(data);
  });

  // ─── Report ──────────────────────────────────────────

  console.log('─'.repeat(60));
  let failed = 0;
  for (const r of results) {
    const icon = r.passed ? '✅' : '❌';
    console.log(`  ${icon}  ${r.name.padEnd(30)} ${r.endpoint}`);
    if (!r.passed && r.detail) {
      // Truncate long Zod errors
      const lines = r.detail.split('\n').slice(0, 5).join('\n    ');
      console.log(`       ${lines}`);
      failed++;
    }
  }
  console.log('─'.repeat(60));
  console.log(`\n  Total: ${results.length}  Passed: ${results.length - failed}  Failed: ${failed}\n`);

  if (failed > 0) {
    console.log('❌ Integration health check FAILED\n');
    process.exit(1);
  } else {
    console.log('✅ All integration checks PASSED\n');
    process.exit(0);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
