import { describe, it, expect, jest } from '@jest/globals';
import { IssuingProcessor, MockIssuingAdapter, runIssuingFlow } from '../src/modules/issuing';
import { makeConfig } from './helpers';

describe('runIssuingFlow', () => {
  it('issues, tops up and walks the card through its lifecycle', async () => {
    const processor = new IssuingProcessor(new MockIssuingAdapter());

    const result = await runIssuingFlow(processor, makeConfig({ doTopup: true, topupAmountCents: 2500 }), {
      name: 'Test Cardholder',
    });

    expect(result.cardholder.name).toBe('Test Cardholder');
    expect(result.card).toMatchObject({ cardholder_id: result.cardholder.id, currency: 'USD', balance_cents: 0 });
    expect(result.topup).toMatchObject({ id: result.card.id, amount_cents: 2500, currency: 'usd', balance_cents: 2500 });
    expect(result.statuses).toEqual(['frozen', 'active', 'closed']);
  });

  it('skips the top-up unless authorized', async () => {
    const gateway = new MockIssuingAdapter();
    const loadFunds = jest.spyOn(gateway, 'loadFunds');

    const result = await runIssuingFlow(new IssuingProcessor(gateway), makeConfig(), { name: 'Test Cardholder' });

    expect(result.topup).toBeNull();
    expect(loadFunds).not.toHaveBeenCalled();
    expect(result.statuses).toEqual(['frozen', 'active', 'closed']);
  });

  it('creates nothing when the top-up amount is invalid', async () => {
    const gateway = new MockIssuingAdapter();
    const createCardholder = jest.spyOn(gateway, 'createCardholder');

    await expect(
      runIssuingFlow(new IssuingProcessor(gateway), makeConfig({ topupAmountCents: 0 }), { name: 'Test Cardholder' })
    ).rejects.toMatchObject({ code: 'INVALID_TOPUP_AMOUNT' });
    expect(createCardholder).not.toHaveBeenCalled();
  });
});
