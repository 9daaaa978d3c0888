/**
 * Fee ledger: registration payments retained by the node, withdrawable
 * by the administrator only. Also holds the current creation fee.
 */

import { getAddress, isAddressEqual, type Address } from 'viem';
import { z } from 'zod';
import { zAddress, zUint256 } from '@crossvote/shared';
import { fail, type GovernanceFailure } from '../governance/errors.js';
import type { EventLog } from '../storage/logStore.js';
import { readStateFile, writeStateFile } from '../storage/stateFile.js';
import { amount } from '../lib/hex.js';

const MAX_RECORDS = Number(process.env.FEE_RECORDS_MAX ?? '200');

const FeeRecordSchema = z.object({
  id: z.string(),
  payer: zAddress,
  amount: zUint256,
  reason: z.literal('DAO_REGISTRATION'),
  timestamp: z.number(),
});

const LedgerFileSchema = z.object({
  version: z.literal(1),
  creationFee: zUint256,
  balance: zUint256,
  totalWithdrawn: zUint256,
  /** Newest first, at most MAX_RECORDS. */
  records: z.array(FeeRecordSchema).default([]),
});

export type FeeReason = 'DAO_REGISTRATION';

export interface FeeRecord {
  id: string;
  payer: Address;
  amount: bigint;
  reason: FeeReason;
  timestamp: number; // ms
}

export type WithdrawResult = { ok: true; amount: bigint; to: Address } | GovernanceFailure;

export interface FeeLedger {
  creationFee(): bigint;
  setCreationFee(fee: bigint): void;
  collect(payer: Address, value: bigint, reason: FeeReason): FeeRecord;
  /** Reverses a collect whose surrounding operation could not complete. */
  refund(record: FeeRecord): void;
  balance(): bigint;
  totalWithdrawn(): bigint;
  records(limit?: number): FeeRecord[];
  withdraw(caller: Address): WithdrawResult;
}

function generateId(): string {
  return `fee_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

export function createFeeLedger(options: {
  administrator: Address;
  creationFee: bigint;
  log: EventLog;
  file?: string;
}): FeeLedger {
  const administrator = getAddress(options.administrator);
  const loaded = options.file ? readStateFile(options.file, LedgerFileSchema) : undefined;
  let creationFee = loaded?.creationFee ?? options.creationFee;
  let balance = loaded?.balance ?? 0n;
  let totalWithdrawn = loaded?.totalWithdrawn ?? 0n;
  let records: FeeRecord[] = (loaded?.records ?? []).map((r) => ({ ...r, payer: getAddress(r.payer) }));

  function persist(): void {
    if (!options.file) return;
    writeStateFile(options.file, {
      version: 1,
      creationFee: amount(creationFee),
      balance: amount(balance),
      totalWithdrawn: amount(totalWithdrawn),
      records: records.map((r) => ({ ...r, amount: amount(r.amount) })),
    });
  }

  /** Apply a change to the ledger state; roll it back if it cannot be persisted. */
  function commit(apply: () => void): void {
    const before = { creationFee, balance, totalWithdrawn, records };
    records = [...records];
    apply();
    try {
      persist();
    } catch (err) {
      ({ creationFee, balance, totalWithdrawn, records } = before);
      throw err;
    }
  }

  return {
    creationFee: () => creationFee,

    setCreationFee(fee) {
      commit(() => {
        creationFee = fee;
      });
    },

    collect(payer, value, reason) {
      const record: FeeRecord = { id: generateId(), payer: getAddress(payer), amount: value, reason, timestamp: Date.now() };
      commit(() => {
        balance += value;
        records.unshift(record);
        if (records.length > MAX_RECORDS) records.pop();
      });
      return record;
    },

    refund(record) {
      commit(() => {
        balance -= record.amount;
        records = records.filter((r) => r.id !== record.id);
      });
      console.warn(`[feeLedger] refunded ${amount(record.amount)} to ${record.payer} (${record.reason})`);
    },

    balance: () => balance,

    totalWithdrawn: () => totalWithdrawn,

    records: (limit = 50) => records.slice(0, limit),

    withdraw(caller) {
      if (!isAddressEqual(caller, administrator)) {
        return fail('UNAUTHORIZED', 'Only the administrator can withdraw fees');
      }
      const withdrawn = balance;
      commit(() => {
        balance = 0n;
        totalWithdrawn += withdrawn;
      });
      options.log.append('FEES_WITHDRAWN', { to: administrator, amount: amount(withdrawn) });
      console.log(`[feeLedger] ${amount(withdrawn)} withdrawn to ${administrator}`);
      return { ok: true, amount: withdrawn, to: administrator };
    },
  };
}
