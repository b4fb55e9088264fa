import { describe, it, expect, beforeEach } from '@jest/globals';
import Stripe from 'stripe';
import { AdapterError } from '../src/shared/errors';
import { StripeIssuingAdapter, StripeIssuingClient } from '../src/modules/issuing';

type CardResult = Awaited<ReturnType<StripeIssuingClient['retrieveCard']>>;
type TopupResult = Awaited<ReturnType<StripeIssuingClient['createTopup']>>;

interface Calls {
  cardholders: Stripe.Issuing.CardholderCreateParams[];
  cards: Stripe.Issuing.CardCreateParams[];
  statusUpdates: Array<[string, Stripe.Issuing.Card.Status]>;
  topups: Array<{ params: Stripe.TopupCreateParams; idempotencyKey: string }>;
  topupLists: Stripe.TopupListParams[];
}

/**
 * In-process stand-in for the Stripe SDK surface the adapter uses
 */
function fakeStripe(listed: TopupResult[] = []): { client: StripeIssuingClient; calls: Calls } {
  const calls: Calls = { cardholders: [], cards: [], statusUpdates: [], topups: [], topupLists: [] };

  const card = (id: string, status: Stripe.Issuing.Card.Status): CardResult => ({
    id,
    currency: 'usd',
    status,
    last4: '4242',
    cardholder: { id: 'ich_fake' },
  });

  const client: StripeIssuingClient = {
    async createCardholder(params) {
      calls.cardholders.push(params);
      return { id: 'ich_fake', name: params.name, email: params.email ?? null };
    },
    async createCard(params) {
      calls.cards.push(params);
      return card('ic_fake', 'active');
    },
    async retrieveCard(cardId) {
      return card(cardId, 'inactive');
    },
    async updateCardStatus(cardId, status) {
      calls.statusUpdates.push([cardId, status]);
      return card(cardId, status);
    },
    async createTopup(params, idempotencyKey) {
      calls.topups.push({ params, idempotencyKey });
      return {
        id: 'tu_fake',
        amount: params.amount,
        currency: params.currency,
        status: 'pending',
        created: 1_700_000_000,
        metadata: { card_id: 'card_123' },
      };
    },
    async *listTopups(params) {
      calls.topupLists.push(params);
      for (const topup of listed) {
        yield topup;
      }
    },
  };

  return { client, calls };
}

const BILLING = {
  line1: '1 Test Street',
  city: 'Testville',
  postal_code: '00000',
  country: 'US',
};

describe('StripeIssuingAdapter', () => {
  let calls: Calls;
  let adapter: StripeIssuingAdapter;

  beforeEach(() => {
    const fake = fakeStripe([
      { id: 'tu_1', amount: 1000, currency: 'usd', status: 'succeeded', created: 1_700_000_000, metadata: { card_id: 'vc_1' } },
      { id: 'tu_2', amount: 2000, currency: 'usd', status: 'succeeded', created: 1_700_000_100, metadata: {} },
    ]);
    calls = fake.calls;
    adapter = new StripeIssuingAdapter({ apiKey: 'sk_live_placeholder', client: fake.client });
  });

  it('is a live adapter', () => {
    expect(adapter.mode).toBe('live');
    expect(adapter.name).toBe('STRIPE_ISSUING');
  });

  it('creates an individual cardholder with billing address', async () => {
    const cardholder = await adapter.createCardholder({ name: 'Alice Example', email: 'alice@example.com', billing: BILLING });

    expect(cardholder).toEqual({ id: 'ich_fake', name: 'Alice Example', email: 'alice@example.com' });
    expect(calls.cardholders[0]).toMatchObject({
      type: 'individual',
      name: 'Alice Example',
      email: 'alice@example.com',
      billing: { address: { line1: '1 Test Street', city: 'Testville', postal_code: '00000', country: 'US' } },
    });
  });

  it('requires a billing address before calling Stripe', async () => {
    await expect(adapter.createCardholder({ name: 'No Address' })).rejects.toMatchObject({
      code: 'BILLING_REQUIRED',
    });
    expect(calls.cardholders).toHaveLength(0);
  });

  it('issues a virtual card with a lower-cased currency', async () => {
    const card = await adapter.issueVirtualCard({ cardholderId: 'ich_fake', currency: 'USD' });

    expect(calls.cards).toEqual([{ cardholder: 'ich_fake', type: 'virtual', currency: 'usd' }]);
    expect(card).toEqual({
      id: 'ic_fake',
      cardholder_id: 'ich_fake',
      currency: 'USD',
      balance_cents: null,
      status: 'active',
      last4: '4242',
    });
  });

  it('loads funds by creating a top-up tagged with the card id', async () => {
    const result = await adapter.loadFunds({ cardId: 'card_123', amountCents: 1500, currency: 'USD', description: 'top-up' });

    expect(result).toEqual({
      id: 'card_123',
      topup_id: 'tu_fake',
      amount_cents: 1500,
      currency: 'usd',
      balance_cents: null,
      status: 'pending',
    });
    expect(calls.topups).toHaveLength(1);
    expect(calls.topups[0].params).toEqual({
      amount: 1500,
      currency: 'usd',
      description: 'top-up',
      metadata: { card_id: 'card_123' },
    });
    expect(calls.topups[0].idempotencyKey).toMatch(/^topup_card_123_[0-9a-f-]{36}$/);
  });

  it('maps Stripe card statuses to card statuses', async () => {
    expect(await adapter.freezeCard('ic_1')).toEqual({ id: 'ic_1', status: 'frozen' });
    expect(await adapter.unfreezeCard('ic_1')).toEqual({ id: 'ic_1', status: 'active' });
    expect(await adapter.closeCard('ic_1')).toEqual({ id: 'ic_1', status: 'closed' });
    expect(calls.statusUpdates).toEqual([
      ['ic_1', 'inactive'],
      ['ic_1', 'active'],
      ['ic_1', 'canceled'],
    ]);
    expect((await adapter.getCard('ic_1')).status).toBe('frozen');
  });

  it('reconciles top-ups, calling back only for card-attributed ones', async () => {
    const seen: Array<[string, number, string]> = [];
    const records = await adapter.reconcileTopups({
      since: 1_700_000_000,
      updateFn: (cardId, amount, topupId) => {
        seen.push([cardId, amount, topupId]);
      },
    });

    expect(calls.topupLists).toEqual([{ created: { gte: 1_700_000_000 }, limit: 100 }]);
    expect(records).toHaveLength(2);
    expect(records[1].card_id).toBeNull();
    expect(seen).toEqual([['vc_1', 1000, 'tu_1']]);
  });

  it('wraps SDK failures in AdapterError', async () => {
    const { client } = fakeStripe();
    const failing = new StripeIssuingAdapter({
      apiKey: 'sk_live_placeholder',
      client: {
        ...client,
        createCard: async () => {
          throw new Error('socket hang up');
        },
      },
    });

    const attempt = failing.issueVirtualCard({ cardholderId: 'ich_fake' });
    await expect(attempt).rejects.toBeInstanceOf(AdapterError);
    await expect(attempt).rejects.toMatchObject({ message: 'socket hang up', code: 'STRIPE_ERROR', retryable: false });
  });

  it.each<[string, Error, { code: string; retryable: boolean }]>([
    [
      'a card error keeps its code',
      new Stripe.errors.StripeCardError({ type: 'card_error', code: 'card_declined', message: 'Your card was declined.' }),
      { code: 'card_declined', retryable: false },
    ],
    [
      'a connection error is retryable',
      new Stripe.errors.StripeConnectionError({ type: 'api_error', message: 'An error occurred with our connection to Stripe.' }),
      { code: 'STRIPE_ERROR', retryable: true },
    ],
    [
      'a rate limit error is retryable',
      new Stripe.errors.StripeRateLimitError({ type: 'rate_limit_error', code: 'rate_limit', message: 'Too many requests.' }),
      { code: 'rate_limit', retryable: true },
    ],
  ])('maps Stripe SDK errors: %s', async (_label, sdkError, expected) => {
    const { client } = fakeStripe();
    const failing = new StripeIssuingAdapter({
      apiKey: 'sk_live_placeholder',
      client: {
        ...client,
        retrieveCard: async () => {
          throw sdkError;
        },
      },
    });

    const attempt = failing.getCard('ic_1');
    await expect(attempt).rejects.toBeInstanceOf(AdapterError);
    await expect(attempt).rejects.toMatchObject({ message: sdkError.message, ...expected });
  });
});
