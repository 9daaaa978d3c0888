/**
 * Chain node config.
 * Loads deployments/<CHAIN_NAME>.json (or CHAIN_CONFIG_PATH) and applies env
 * overrides on top, then validates the merged result with zod.
 *
 * Strict mode (STRICT_CONFIG=true):
 *   Fail-closed on misconfiguration. Zero administrator or gateway addresses,
 *   an empty trusted-remote table, trusted remotes without a state directory
 *   and an on-chain membership source without an RPC URL are rejected at
 *   load time. Local dev runs without it.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import type { Address, Hex } from 'viem';
import {
  DEFAULT_CHAIN_ID,
  RemoteGatewaySchema,
  ZERO_ADDRESS,
  ZERO_BYTES32,
  chainName,
  zAddress,
  zDomainId,
  zUint256,
} from '@crossvote/shared';
import type { BalanceEntry } from '../services/membership.js';
import { toBytes32 } from '../lib/hex.js';

// ─── Schema ──────────────────────────────────────────────

const StaticMembershipSchema = z.object({
  mode: z.literal('static'),
  whitelist: z.array(zAddress).default([]),
  balances: z.array(z.object({ token: zAddress, holder: zAddress, amount: zUint256 })).default([]),
});

const OnchainMembershipSchema = z.object({
  mode: z.literal('onchain'),
  whitelistContract: zAddress,
});

const TrustedRemoteSchema = z.object({
  domain: zDomainId,
  gateway: RemoteGatewaySchema,
  /** Base URL of the peer node, for the HTTP transport. */
  url: z.string().url().optional(),
});

const ChainConfigFileSchema = z.object({
  chainId: zDomainId.default(DEFAULT_CHAIN_ID),
  name: z.string().min(1).optional(),
  port: z.coerce.number().int().min(0).max(65_535).default(4000),
  rpcUrl: z.string().default(''),
  administrator: zAddress.default(ZERO_ADDRESS),
  gatewayAddress: zAddress.default(ZERO_ADDRESS),
  creationFee: zUint256.default('0'),
  trustedRemotes: z.array(TrustedRemoteSchema).default([]),
  membership: z
    .discriminatedUnion('mode', [StaticMembershipSchema, OnchainMembershipSchema])
    .default({ mode: 'static' }),
  stateDir: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
});

export type MembershipConfig =
  | { mode: 'static'; whitelist: Address[]; balances: BalanceEntry[] }
  | { mode: 'onchain'; whitelistContract: Address };

export interface ChainConfig {
  chainId: number;
  name: string;
  port: number;
  rpcUrl: string;
  administrator: Address;
  gatewayAddress: Address;
  creationFee: bigint;
  /** domain → bytes32 of the trusted gateway on that domain */
  trustedRemotes: Map<number, Hex>;
  /** domain → peer base URL, where configured */
  peers: Record<number, string>;
  membership: MembershipConfig;
  stateDir?: string;
  logFile?: string;
  source: string | null;
}

// ─── Errors ──────────────────────────────────────────────

/** Whether STRICT_CONFIG=true is set in the given environment. */
export function isStrictMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.STRICT_CONFIG === 'true';
}

/**
 * Thrown at startup when the config cannot be used. Lists every violation
 * so operators can fix everything in one pass.
 */
export class ChainConfigError extends Error {
  public readonly violations: string[];
  constructor(violations: string[], strict = false) {
    const header = strict
      ? `[STRICT_CONFIG] Chain config is not production-safe (${violations.length} violation(s)):`
      : `Chain config is invalid (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.name = 'ChainConfigError';
    this.violations = violations;
  }
}

// ─── Loading ─────────────────────────────────────────────

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string {
  const explicit = envString(env, 'CHAIN_CONFIG_PATH');
  if (explicit) return isAbsolute(explicit) ? explicit : resolve(process.cwd(), explicit);

  const file = `${envString(env, 'CHAIN_NAME') ?? 'local'}.json`;
  const candidates = [
    resolve(process.cwd(), 'deployments', file),
    resolve(process.cwd(), 'apps', 'backend', 'deployments', file),
  ];
  return candidates.find((p) => existsSync(p)) ?? resolve(process.cwd(), 'deployments', file);
}

const FileObjectSchema = z.record(z.unknown());

function readConfigFile(path: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ChainConfigError([`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const parsed = FileObjectSchema.safeParse(raw);
  if (!parsed.success) throw new ChainConfigError([`${path} must contain a JSON object`]);
  return parsed.data;
}

/** Env values win over the file; unset or blank variables are ignored. */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const pairs: Array<[string, string | undefined]> = [
    ['chainId', envString(env, 'CHAIN_ID')],
    ['port', envString(env, 'PORT')],
    ['rpcUrl', envString(env, 'RPC_URL')],
    ['administrator', envString(env, 'ADMINISTRATOR_ADDRESS')],
    ['gatewayAddress', envString(env, 'GATEWAY_ADDRESS')],
    ['creationFee', envString(env, 'CREATION_FEE')],
    ['stateDir', envString(env, 'STATE_DIR')],
    ['logFile', envString(env, 'LOG_STORE_PATH')],
  ];
  const out: Record<string, unknown> = {};
  for (const [key, value] of pairs) if (value !== undefined) out[key] = value;
  return out;
}

function validateStrict(config: ChainConfig): void {
  const violations: string[] = [];

  if (config.administrator === ZERO_ADDRESS) {
    violations.push('administrator is the zero address. Set ADMINISTRATOR_ADDRESS or update the deployment file.');
  }
  if (config.gatewayAddress === ZERO_ADDRESS) {
    violations.push('gatewayAddress is the zero address. Set GATEWAY_ADDRESS or update the deployment file.');
  }
  if (config.trustedRemotes.size === 0) {
    violations.push('trustedRemotes is empty; every inbound message would be rejected and nothing can be sent.');
  }
  if (config.trustedRemotes.size > 0 && !config.stateDir) {
    violations.push('stateDir is not set; governance state and applied vote keys would be lost on restart. Set STATE_DIR.');
  }
  for (const [domain, gateway] of config.trustedRemotes) {
    if (gateway === ZERO_BYTES32) violations.push(`trusted remote for domain ${domain} is zero.`);
  }
  if (config.membership.mode === 'onchain') {
    if (config.rpcUrl === '') {
      violations.push('membership mode is onchain but rpcUrl is empty. Set RPC_URL.');
    }
    if (config.membership.whitelistContract === ZERO_ADDRESS) {
      violations.push('membership.whitelistContract is the zero address.');
    }
  }

  if (violations.length > 0) throw new ChainConfigError(violations, true);
}

/**
 * Load and validate the chain config.
 * Throws ChainConfigError on schema violations, and in strict mode on
 * anything that would make the node run unsafely.
 */
export function loadChainConfig(env: NodeJS.ProcessEnv = process.env): ChainConfig {
  const path = resolveConfigPath(env);
  const fromFile = existsSync(path) ? readConfigFile(path) : {};
  if (!existsSync(path)) {
    console.warn(`[config] ${path} not found, using defaults and environment only`);
  }

  const parsed = ChainConfigFileSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!parsed.success) {
    throw new ChainConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  const raw = parsed.data;

  const violations: string[] = [];
  const trustedRemotes = new Map<number, Hex>();
  const peers: Record<number, string> = {};
  for (const remote of raw.trustedRemotes) {
    if (remote.domain === raw.chainId) {
      violations.push(`trustedRemotes lists the node's own domain ${remote.domain}.`);
      continue;
    }
    if (trustedRemotes.has(remote.domain)) {
      violations.push(`trustedRemotes lists domain ${remote.domain} more than once.`);
      continue;
    }
    trustedRemotes.set(remote.domain, toBytes32(remote.gateway));
    if (remote.url) peers[remote.domain] = remote.url;
  }
  if (violations.length > 0) throw new ChainConfigError(violations);

  const config: ChainConfig = {
    chainId: raw.chainId,
    name: raw.name ?? chainName(raw.chainId),
    port: raw.port,
    rpcUrl: raw.rpcUrl,
    administrator: raw.administrator,
    gatewayAddress: raw.gatewayAddress,
    creationFee: raw.creationFee,
    trustedRemotes,
    peers,
    membership: raw.membership,
    stateDir: raw.stateDir,
    logFile: raw.logFile,
    source: existsSync(path) ? path : null,
  };

  if (isStrictMode(env)) validateStrict(config);
  return config;
}
