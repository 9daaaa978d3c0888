import { z } from 'zod';
import { MAX_UINT256, MAX_UINT64 } from '../constants/index.js';

// ─── Hex / Address Validators ────────────────────────────
// Reusable Zod refinements for EVM-compatible data.
// Outputs are typed `0x${string}` so they line up with viem's Address/Hex.

function isPrefixedHex(v: string): v is `0x${string}` {
  return v.startsWith('0x');
}

/** Ethereum address: 0x + 40 hex chars */
export const zAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid Ethereum address (expected 0x + 40 hex chars)')
  .refine(isPrefixedHex);

/** 32-byte hex: 0x + 64 hex chars (DAO ids, proposal ids, message ids) */
export const zBytes32 = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Invalid bytes32 (expected 0x + 64 hex chars)')
  .refine(isPrefixedHex);

/** Arbitrary hex data: 0x + even-length hex (payloads, etc.) */
export const zHexData = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, 'Invalid hex data (expected 0x + even hex length)')
  .refine(isPrefixedHex);

// ─── Numeric Validators ──────────────────────────────────

/** uint256 given as a decimal string or a safe integer; parsed to bigint. */
export const zUint256 = z
  .union([
    z.string().regex(/^\d+$/, 'Invalid uint256 (expected a decimal string)'),
    z.number().int().nonnegative().safe(),
  ])
  .transform((v) => BigInt(v))
  .refine((v) => v <= MAX_UINT256, 'Value exceeds uint256');

/** uint64 sequence numbers, same input forms as zUint256. */
export const zUint64 = zUint256.refine((v) => v <= MAX_UINT64, 'Value exceeds uint64');

/** Unix timestamp in seconds. */
export const zUnixSeconds = z.number().int().nonnegative().safe();

/** Transport domain identifier (uint32). */
export const zDomainId = z.coerce.number().int().min(0).max(0xffffffff);
