import { describe, it, expect, beforeEach } from '@jest/globals';
import { AdapterError, PaymentError } from '../src/shared/errors';
import { IssuingProcessor, MockIssuingAdapter } from '../src/modules/issuing';

describe('IssuingProcessor with MockIssuingAdapter', () => {
  let adapter: MockIssuingAdapter;
  let issuing: IssuingProcessor;
  let clock: number;

  beforeEach(() => {
    clock = 1_700_000_000;
    adapter = new MockIssuingAdapter({ now: () => clock });
    issuing = new IssuingProcessor(adapter);
  });

  it('issues, loads and walks a card through its statuses', async () => {
    const cardholder = await issuing.createCardholder({ name: 'Bob' });
    expect(cardholder.id).toMatch(/^ich_[0-9a-f]{12}$/);
    expect(cardholder.email).toBeNull();

    const card = await issuing.issueVirtualCard({
      cardholderId: cardholder.id,
      currency: 'usd',
      initialBalanceCents: 2500,
    });
    expect(card.id).toMatch(/^vc_[0-9a-f]{12}$/);
    expect(card.currency).toBe('USD');
    expect(card.balance_cents).toBe(2500);
    expect(card.status).toBe('active');

    const loaded = await issuing.loadFunds({ cardId: card.id, amountCents: 500 });
    expect(loaded.balance_cents).toBe(3000);
    expect(loaded.amount_cents).toBe(500);
    expect(loaded.currency).toBe('usd');

    await issuing.freezeCard(card.id);
    expect((await issuing.getCard(card.id)).status).toBe('frozen');

    await issuing.unfreezeCard(card.id);
    expect((await issuing.getCard(card.id)).status).toBe('active');

    await issuing.closeCard(card.id);
    expect((await issuing.getCard(card.id)).status).toBe('closed');
  });

  it('reports the gateway mode', () => {
    expect(issuing.mode).toBe('mock');
    expect(issuing.gatewayName).toBe('ISSUING_MOCK');
  });

  it('returns copies, not live state', async () => {
    const cardholder = await issuing.createCardholder({ name: 'Carol' });
    const card = await issuing.issueVirtualCard({ cardholderId: cardholder.id, initialBalanceCents: 100 });

    await issuing.loadFunds({ cardId: card.id, amountCents: 50 });

    expect(card.balance_cents).toBe(100);
    expect((await issuing.getCard(card.id)).balance_cents).toBe(150);
  });

  describe('validation', () => {
    it('requires a cardholder name', async () => {
      await expect(issuing.createCardholder({ name: '' })).rejects.toThrow(PaymentError);
      await expect(issuing.createCardholder({ name: '   ' })).rejects.toThrow('name required');
    });

    it('requires a cardholder id', async () => {
      await expect(issuing.issueVirtualCard({ cardholderId: '' })).rejects.toThrow('cardholder_id required');
    });

    it('rejects a negative initial balance', async () => {
      const cardholder = await issuing.createCardholder({ name: 'Dan' });
      await expect(
        issuing.issueVirtualCard({ cardholderId: cardholder.id, initialBalanceCents: -1 })
      ).rejects.toThrow(PaymentError);
    });

    it.each([0, -100, 12.5])('rejects a load of %p cents', async (amountCents) => {
      await expect(issuing.loadFunds({ cardId: 'vc_any', amountCents })).rejects.toThrow('amount_cents must be > 0');
    });

    it('requires a card id to read a card', async () => {
      await expect(issuing.getCard('')).rejects.toThrow('card_id required');
    });
  });

  describe('adapter errors', () => {
    it('refuses to issue for an unknown cardholder', async () => {
      await expect(issuing.issueVirtualCard({ cardholderId: 'ich_missing' })).rejects.toMatchObject({
        name: 'AdapterError',
        code: 'CARDHOLDER_NOT_FOUND',
      });
    });

    it('refuses to load an unknown card', async () => {
      await expect(issuing.loadFunds({ cardId: 'vc_missing', amountCents: 100 })).rejects.toMatchObject({
        code: 'CARD_NOT_FOUND',
      });
    });

    it('refuses to load a closed card', async () => {
      const cardholder = await issuing.createCardholder({ name: 'Erin' });
      const card = await issuing.issueVirtualCard({ cardholderId: cardholder.id });
      await issuing.closeCard(card.id);

      await expect(issuing.loadFunds({ cardId: card.id, amountCents: 100 })).rejects.toMatchObject({
        code: 'CARD_CLOSED',
      });
    });

    it('rejects a non-positive amount at the adapter too', async () => {
      const cardholder = await adapter.createCardholder({ name: 'Fay' });
      const card = await adapter.issueVirtualCard({ cardholderId: cardholder.id });

      await expect(adapter.loadFunds({ cardId: card.id, amountCents: 0 })).rejects.toThrow(AdapterError);
    });

    it('refuses status changes on an unknown card', async () => {
      await expect(issuing.freezeCard('vc_missing')).rejects.toThrow('card not found: vc_missing');
    });
  });

  describe('reconcileTopups', () => {
    it('reports top-ups since the cutoff and calls back for card-attributed ones', async () => {
      const cardholder = await issuing.createCardholder({ name: 'Gus' });
      const card = await issuing.issueVirtualCard({ cardholderId: cardholder.id });

      const early = await issuing.loadFunds({ cardId: card.id, amountCents: 100 });
      clock = 1_700_000_100;
      const late = await issuing.loadFunds({ cardId: card.id, amountCents: 1000 });
      const unattributed = adapter.recordUnattributedTopup(2000);

      const seen: Array<[string, number, string]> = [];
      const records = await issuing.reconcileTopups({
        since: 1_700_000_100,
        updateFn: (cardId, amountCents, topupId) => {
          seen.push([cardId, amountCents, topupId]);
        },
      });

      expect(records.map((record) => record.id)).toEqual([late.topup_id, unattributed.id]);
      expect(records.map((record) => record.id)).not.toContain(early.topup_id);
      expect(seen).toEqual([[card.id, 1000, late.topup_id]]);
    });
  });
});
