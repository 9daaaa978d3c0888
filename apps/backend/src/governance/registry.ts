/**
 * DAO registry. One record per id, controller = registering caller.
 * Only the controller may change its DAO's minimum-token threshold;
 * only the administrator may change the creation fee.
 */

import { getAddress, isAddressEqual, type Address, type Hex } from 'viem';
import { ZERO_ADDRESS } from '@crossvote/shared';
import type { DaoStore } from '../storage/daoStore.js';
import type { EventLog } from '../storage/logStore.js';
import type { FeeLedger } from '../services/feeLedger.js';
import { amount, normalizeId } from '../lib/hex.js';
import { fail, type GovernanceFailure } from './errors.js';
import type { Clock, DaoRecord } from './types.js';

export interface RegisterDaoInput {
  id: Hex;
  name: string;
  description: string;
  metadataRef: string;
  governanceToken: Address;
  minimumTokens: bigint;
}

export type DaoResult = { ok: true; dao: DaoRecord } | GovernanceFailure;
export type CreationFeeResult = { ok: true; fee: bigint } | GovernanceFailure;

export interface DaoRegistry {
  register(caller: Address, input: RegisterDaoInput, payment: bigint): DaoResult;
  setMinimumTokens(caller: Address, id: Hex, minimumTokens: bigint): DaoResult;
  setCreationFee(caller: Address, fee: bigint): CreationFeeResult;
  getCreationFee(): bigint;
  getDao(id: Hex): DaoResult;
}

export interface DaoRegistryDeps {
  daos: DaoStore;
  fees: FeeLedger;
  log: EventLog;
  clock: Clock;
  administrator: Address;
}

export function createDaoRegistry(deps: DaoRegistryDeps): DaoRegistry {
  const { daos, fees, log, clock } = deps;
  const administrator = getAddress(deps.administrator);

  return {
    register(caller, input, payment) {
      const id = normalizeId(input.id);
      if (isAddressEqual(caller, ZERO_ADDRESS)) {
        return fail('UNAUTHORIZED', 'The zero address cannot control a DAO');
      }
      if (daos.has(id)) {
        return fail('DUPLICATE_ID', `DAO ${id} is already registered`);
      }
      const fee = fees.creationFee();
      if (payment < fee) {
        return fail('INSUFFICIENT_FEE', `Registration requires ${amount(fee)}, got ${amount(payment)}`);
      }

      const dao: DaoRecord = {
        id,
        controller: getAddress(caller),
        name: input.name,
        description: input.description,
        metadataRef: input.metadataRef,
        governanceToken: getAddress(input.governanceToken),
        minimumTokens: input.minimumTokens,
        createdAt: clock(),
      };
      // The fee is taken first so a DAO is never stored unpaid.
      const receipt = payment > 0n ? fees.collect(dao.controller, payment, 'DAO_REGISTRATION') : undefined;
      try {
        daos.put(dao);
      } catch (err) {
        if (receipt) fees.refund(receipt);
        throw err;
      }

      log.append('DAO_CREATED', {
        daoId: dao.id,
        controller: dao.controller,
        name: dao.name,
        metadataRef: dao.metadataRef,
        governanceToken: dao.governanceToken,
        minimumTokens: amount(dao.minimumTokens),
        fee: amount(payment),
      });
      return { ok: true, dao };
    },

    setMinimumTokens(caller, rawId, minimumTokens) {
      const existing = daos.get(rawId);
      if (!existing) return fail('UNKNOWN_DAO', `DAO ${normalizeId(rawId)} is not registered`);
      if (!isAddressEqual(caller, existing.controller)) {
        return fail('UNAUTHORIZED', 'Only the DAO controller can change its token threshold');
      }

      const dao: DaoRecord = { ...existing, minimumTokens };
      daos.put(dao);
      log.append('DAO_UPDATED', {
        daoId: dao.id,
        previousMinimumTokens: amount(existing.minimumTokens),
        minimumTokens: amount(minimumTokens),
      });
      return { ok: true, dao };
    },

    setCreationFee(caller, fee) {
      if (!isAddressEqual(caller, administrator)) {
        return fail('UNAUTHORIZED', 'Only the administrator can change the creation fee');
      }
      const previous = fees.creationFee();
      fees.setCreationFee(fee);
      log.append('CREATION_FEE_UPDATED', { previousFee: amount(previous), fee: amount(fee) });
      return { ok: true, fee };
    },

    getCreationFee: () => fees.creationFee(),

    getDao(rawId) {
      const dao = daos.get(rawId);
      if (!dao) return fail('UNKNOWN_DAO', `DAO ${normalizeId(rawId)} is not registered`);
      return { ok: true, dao };
    },
  };
}
