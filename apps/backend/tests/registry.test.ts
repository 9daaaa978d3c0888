import { describe, it, expect } from 'vitest';
import { ZERO_ADDRESS } from '@crossvote/shared';
import { ADMIN, CONTROLLER, DAO_1, OUTSIDER, TOKEN, makeNode, registerDao } from './fixtures.js';

const input = {
  id: DAO_1,
  name: 'Test DAO',
  description: 'placeholder',
  metadataRef: 'ipfs://placeholder',
  governanceToken: TOKEN,
  minimumTokens: 100n,
};

describe('DAO registry', () => {
  describe('register', () => {
    it('stores the record with the caller as controller', () => {
      const { node } = makeNode({ start: 42 });
      const result = node.registry.register(CONTROLLER, input, 0n);

      expect(result.ok).toBe(true);
      const stored = node.registry.getDao(DAO_1);
      if (!stored.ok) throw new Error('expected DAO');
      expect(stored.dao.controller).toBe(CONTROLLER);
      expect(stored.dao.minimumTokens).toBe(100n);
      expect(stored.dao.createdAt).toBe(42);
      expect(node.log.readByType('DAO_CREATED')).toHaveLength(1);
    });

    it('rejects a second registration of the same id', () => {
      const { node } = makeNode();
      registerDao(node);

      const result = node.registry.register(OUTSIDER, { ...input, name: 'Other' }, 0n);
      expect(result).toMatchObject({ ok: false, code: 'DUPLICATE_ID' });

      const stored = node.registry.getDao(DAO_1);
      expect(stored.ok && stored.dao.controller).toBe(CONTROLLER);
    });

    it('rejects the zero address as controller', () => {
      const { node } = makeNode();
      expect(node.registry.register(ZERO_ADDRESS, input, 0n)).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
      expect(node.daos.has(DAO_1)).toBe(false);
    });

    it('requires the creation fee and keeps the whole payment', () => {
      const { node } = makeNode({ creationFee: 50n });

      expect(node.registry.register(CONTROLLER, input, 49n)).toMatchObject({ ok: false, code: 'INSUFFICIENT_FEE' });
      expect(node.daos.has(DAO_1)).toBe(false);
      expect(node.fees.balance()).toBe(0n);

      expect(node.registry.register(CONTROLLER, input, 60n).ok).toBe(true);
      expect(node.fees.balance()).toBe(60n);
      expect(node.fees.records()[0]).toMatchObject({ payer: CONTROLLER, amount: 60n, reason: 'DAO_REGISTRATION' });
    });

    it('reports an unknown id on lookup', () => {
      const { node } = makeNode();
      expect(node.registry.getDao(DAO_1)).toMatchObject({ ok: false, code: 'UNKNOWN_DAO' });
    });
  });

  describe('setMinimumTokens', () => {
    it('lets only the controller change the threshold', () => {
      const { node } = makeNode();
      registerDao(node);

      expect(node.registry.setMinimumTokens(OUTSIDER, DAO_1, 1n)).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });

      const result = node.registry.setMinimumTokens(CONTROLLER, DAO_1, 500n);
      expect(result.ok && result.dao.minimumTokens).toBe(500n);

      const [event] = node.log.readByType('DAO_UPDATED');
      expect(event?.payload).toMatchObject({ previousMinimumTokens: '100', minimumTokens: '500' });
    });

    it('resolves the DAO before checking the caller', () => {
      const { node } = makeNode();
      expect(node.registry.setMinimumTokens(OUTSIDER, DAO_1, 1n)).toMatchObject({ ok: false, code: 'UNKNOWN_DAO' });
    });
  });

  describe('creation fee and withdrawals', () => {
    it('only the administrator sets the fee', () => {
      const { node } = makeNode();

      expect(node.registry.setCreationFee(CONTROLLER, 75n)).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
      expect(node.registry.getCreationFee()).toBe(0n);

      expect(node.registry.setCreationFee(ADMIN, 75n)).toEqual({ ok: true, fee: 75n });
      expect(node.registry.getCreationFee()).toBe(75n);
      expect(node.log.readByType('CREATION_FEE_UPDATED')[0]?.payload).toEqual({ previousFee: '0', fee: '75' });
    });

    it('only the administrator withdraws, and the balance is paid out whole', () => {
      const { node } = makeNode({ creationFee: 60n });
      registerDao(node);

      expect(node.fees.withdraw(OUTSIDER)).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
      expect(node.fees.balance()).toBe(60n);

      expect(node.fees.withdraw(ADMIN)).toEqual({ ok: true, amount: 60n, to: ADMIN });
      expect(node.fees.balance()).toBe(0n);
      expect(node.fees.totalWithdrawn()).toBe(60n);
      expect(node.log.readByType('FEES_WITHDRAWN')[0]?.payload).toEqual({ to: ADMIN, amount: '60' });
    });
  });
});
