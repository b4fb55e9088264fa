import { IssuingConfig } from '../src/config';

export function makeConfig(overrides: Partial<IssuingConfig> = {}): IssuingConfig {
  return {
    apiKey: undefined,
    liveRequested: false,
    doTopup: false,
    topupAmountCents: 1000,
    topupCurrency: 'usd',
    liveModeEnabled: false,
    ...overrides,
  };
}
