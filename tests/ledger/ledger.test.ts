/**
 * Ledger: scrip transfers, UBI splitting, quota and depletable resource
 * accounting. Failed calls must leave every balance untouched.
 */

import { ManualClock } from '../../src/domain/clock';
import { Ledger } from '../../src/ledger/ledger';
import { createLogger, setLogHandler } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';

describe('Ledger', () => {
  let ledger: Ledger;

  beforeEach(async () => {
    setLogHandler(() => undefined);
    ledger = new Ledger(createMemoryStore().principals, { allowNegativeScrip: false }, new ManualClock(0), createLogger());
    await ledger.createPrincipal({ id: 'alice', scrip: 100, quotas: { disk: 1000 }, resources: { llm_budget: 5 } });
    await ledger.createPrincipal({ id: 'bob', scrip: 50, quotas: { disk: 200 } });
    await ledger.createPrincipal({ id: 'carol' });
  });

  describe('principals', () => {
    it('rejects a duplicate id', async () => {
      const result = await ledger.createPrincipal({ id: 'alice' });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('already_exists');
    });

    it('rejects negative or fractional starting scrip', async () => {
      const negative = await ledger.createPrincipal({ id: 'dave', scrip: -1 });
      const fractional = await ledger.createPrincipal({ id: 'erin', scrip: 1.5 });
      expect(negative.ok).toBe(false);
      expect(fractional.ok).toBe(false);
    });

    it('lists principals ordered by id', async () => {
      const ids = (await ledger.listPrincipals()).map((p) => p.id);
      expect(ids).toEqual(['alice', 'bob', 'carol']);
    });

    it('reports 0 scrip for an unknown principal', async () => {
      expect(await ledger.getScrip('nobody')).toBe(0);
    });
  });

  describe('scrip', () => {
    it('transfers and returns both balances', async () => {
      const result = await ledger.transferScrip('alice', 'bob', 30);
      expect(result).toEqual({
        ok: true,
        value: { from: 'alice', to: 'bob', amount: 30, fromBalance: 70, toBalance: 80 },
      });
    });

    it('refuses an overdraft without changing balances', async () => {
      const result = await ledger.transferScrip('bob', 'alice', 51);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('insufficient_funds');
        expect(result.error.retriable).toBe(true);
        expect(result.error.details).toEqual({ principalId: 'bob', required: 51, available: 50 });
      }
      expect(await ledger.getScrip('alice')).toBe(100);
      expect(await ledger.getScrip('bob')).toBe(50);
    });

    it('refuses zero, negative and fractional amounts', async () => {
      for (const amount of [0, -5, 2.5]) {
        const result = await ledger.transferScrip('alice', 'bob', amount);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe('invalid_argument');
      }
    });

    it('refuses a transfer to self', async () => {
      const result = await ledger.transferScrip('alice', 'alice', 1);
      expect(result.ok).toBe(false);
    });

    it('refuses an unknown recipient', async () => {
      const result = await ledger.transferScrip('alice', 'ghost', 1);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('not_found');
      expect(await ledger.getScrip('alice')).toBe(100);
    });

    it('keeps total scrip constant across transfers', async () => {
      const before = await ledger.totalScrip();
      await ledger.transferScrip('alice', 'carol', 40);
      await ledger.transferScrip('carol', 'bob', 15);
      await ledger.transferScrip('bob', 'alice', 999);
      expect(await ledger.totalScrip()).toBe(before);
    });

    it('debits and reports why a debit fails', async () => {
      expect(await ledger.deductScrip('bob', 20)).toBe(true);
      expect(await ledger.getScrip('bob')).toBe(30);
      const failed = await ledger.debit('bob', 31);
      expect(failed.ok).toBe(false);
      if (!failed.ok) expect(failed.error.code).toBe('insufficient_funds');
    });

    it('allows overdrafts when negative scrip is enabled', async () => {
      const loose = new Ledger(createMemoryStore().principals, { allowNegativeScrip: true });
      await loose.createPrincipal({ id: 'a', scrip: 5 });
      await loose.createPrincipal({ id: 'b' });
      const result = await loose.transferScrip('a', 'b', 8);
      expect(result.ok).toBe(true);
      expect(await loose.getScrip('a')).toBe(-3);
    });
  });

  describe('distributeUbi', () => {
    it('splits evenly and gives the remainder to the first eligible id', async () => {
      const result = await ledger.distributeUbi(10, ['alice']);
      expect(result).toEqual({ ok: true, value: { bob: 5, carol: 5 } });

      const uneven = await ledger.distributeUbi(7, []);
      expect(uneven).toEqual({ ok: true, value: { alice: 3, bob: 2, carol: 2 } });
    });

    it('debits the source in the same step when one is given', async () => {
      const before = await ledger.totalScrip();
      const result = await ledger.distributeUbi(11, [], 'alice');
      expect(result).toEqual({ ok: true, value: { bob: 6, carol: 5 } });
      expect(await ledger.getScrip('alice')).toBe(89);
      expect(await ledger.totalScrip()).toBe(before);
    });

    it('skips principals whose share rounds to zero', async () => {
      const result = await ledger.distributeUbi(1, []);
      expect(result).toEqual({ ok: true, value: { alice: 1 } });
    });

    it('does nothing when everyone is excluded', async () => {
      const result = await ledger.distributeUbi(9, ['alice', 'bob', 'carol']);
      expect(result).toEqual({ ok: true, value: {} });
      expect(await ledger.getScrip('alice')).toBe(100);
    });

    it('refuses when the source cannot cover the amount', async () => {
      const result = await ledger.distributeUbi(60, [], 'bob');
      expect(result.ok).toBe(false);
      expect(await ledger.getScrip('alice')).toBe(100);
    });
  });

  describe('allocatable quotas', () => {
    it('consumes and releases usage against the limit', async () => {
      const consumed = await ledger.consumeQuota('alice', 'disk', 300);
      expect(consumed).toEqual({ ok: true, value: { limit: 1000, used: 300 } });
      expect(await ledger.getAvailableCapacity('alice', 'disk')).toBe(700);

      const released = await ledger.releaseQuota('alice', 'disk', 500);
      expect(released).toEqual({ ok: true, value: { limit: 1000, used: 0 } });
    });

    it('refuses usage beyond the limit', async () => {
      const result = await ledger.consumeQuota('bob', 'disk', 201);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('quota_exceeded');
        expect(result.error.details).toEqual({ principalId: 'bob', resource: 'disk', requested: 201, available: 200 });
      }
    });

    it('refuses to set a limit below current usage', async () => {
      await ledger.consumeQuota('alice', 'disk', 400);
      const result = await ledger.setQuota('alice', 'disk', 399);
      expect(result.ok).toBe(false);
      expect(await ledger.getQuota('alice', 'disk')).toEqual({ limit: 1000, used: 400 });
    });

    it('moves only unused headroom and conserves total limit', async () => {
      await ledger.consumeQuota('alice', 'disk', 900);
      const tooMuch = await ledger.transferQuota('alice', 'bob', 'disk', 101);
      expect(tooMuch.ok).toBe(false);

      const moved = await ledger.transferQuota('alice', 'bob', 'disk', 100);
      expect(moved.ok).toBe(true);
      expect(await ledger.getQuota('alice', 'disk')).toEqual({ limit: 900, used: 900 });
      expect(await ledger.getQuota('bob', 'disk')).toEqual({ limit: 300, used: 0 });
    });

    it('reports a zero entry for a resource never set', async () => {
      expect(await ledger.getQuota('carol', 'disk')).toEqual({ limit: 0, used: 0 });
    });
  });

  describe('depletable resources', () => {
    it('spends down a balance and refuses to go below zero', async () => {
      expect(await ledger.spendResource('alice', 'llm_budget', 2)).toEqual({ ok: true, value: 3 });
      const over = await ledger.spendResource('alice', 'llm_budget', 3.5);
      expect(over.ok).toBe(false);
      expect(await ledger.getResource('alice', 'llm_budget')).toBe(3);
    });

    it('transfers a balance between principals', async () => {
      const moved = await ledger.transferResource('alice', 'carol', 'llm_budget', 1.5);
      expect(moved.ok).toBe(true);
      expect(await ledger.getResource('alice', 'llm_budget')).toBe(3.5);
      expect(await ledger.getResource('carol', 'llm_budget')).toBe(1.5);
    });
  });
});
