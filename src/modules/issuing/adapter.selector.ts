/**
 * Payment Processor - Adapter Selector & Safety Gate
 * THE AIR GAP: Decides mock vs. live, and whether real money may move.
 *
 * DECISION TABLE (evaluated once per run):
 *   no key                          -> MOCK
 *   key, live not requested         -> MOCK (a credential alone is not intent)
 *   key test-shaped, live requested -> ConfigurationError (never downgrade)
 *   key live/unrecognized, live     -> LIVE
 *
 * Top-ups are a separate gate: authorizeTopup().
 * Both functions are pure; callers do the logging.
 */

import { IssuingConfig } from '../../config';
import { ConfigurationError } from '../../shared/errors';
import { classifyCredential } from './credential';
import { IssuingGateway } from './issuing.port';
import { MockIssuingAdapter } from './adapters/mock-issuing.adapter';
import { StripeIssuingAdapter } from './adapters/stripe-issuing.adapter';

export interface AdapterFactories {
  mock(): IssuingGateway;
  live(apiKey: string): IssuingGateway;
}

const DEFAULT_FACTORIES: AdapterFactories = {
  mock: () => new MockIssuingAdapter(),
  live: (apiKey) => new StripeIssuingAdapter({ apiKey }),
};

export function selectAdapter(
  config: IssuingConfig,
  factories: AdapterFactories = DEFAULT_FACTORIES
): IssuingGateway {
  const apiKey = config.apiKey?.trim();

  if (!apiKey || !config.liveRequested) {
    return factories.mock();
  }

  if (classifyCredential(apiKey) === 'test') {
    throw new ConfigurationError(
      'live mode requested but credential is a test credential',
      'LIVE_WITH_TEST_CREDENTIAL'
    );
  }

  // Unrecognized shapes fall through: only test credentials are blocked
  return factories.live(apiKey);
}

/**
 * Top-up gate. Independent of adapter selection; disabled by default.
 * Throws before any funds-moving call when the amount is not a positive integer.
 */
export function authorizeTopup(config: IssuingConfig): boolean {
  const amount = config.topupAmountCents;

  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ConfigurationError(
      `top-up amount must be a positive integer number of cents, got ${amount}`,
      'INVALID_TOPUP_AMOUNT'
    );
  }

  return config.doTopup;
}
