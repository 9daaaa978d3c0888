import { hexToBytes, pad, size, toHex, type Hex } from 'viem';

/** Lowercase canonical form of a bytes32 id, so map keys compare exactly. */
export function normalizeId(id: Hex): Hex {
  return toHex(hexToBytes(id));
}

/**
 * bytes32 form of a gateway: 20-byte addresses are left-padded,
 * 32-byte values pass through. Output is lowercase.
 */
export function toBytes32(value: Hex): Hex {
  if (size(value) === 32) return normalizeId(value);
  return normalizeId(pad(value, { size: 32 }));
}

/** Stable JSON stand-in for a uint256. */
export function amount(value: bigint): string {
  return value.toString();
}
