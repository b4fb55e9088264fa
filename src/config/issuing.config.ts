/**
 * Payment Processor - Issuing Configuration
 * THE SWITCHBOARD: Read once at process entry, frozen, passed explicitly.
 *
 * Business logic never reads process.env; entry points call
 * loadIssuingConfig(process.env) and hand the result down.
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/errors';
import {
  EnvSource,
  FlagSchema,
  OptionalStringSchema,
  formatZodIssues,
  intWithDefault,
  stringWithDefault,
} from './env';

export const DEFAULT_TOPUP_AMOUNT_CENTS = 1000;
export const DEFAULT_TOPUP_CURRENCY = 'usd';

export const IssuingEnvSchema = z.object({
  STRIPE_API_KEY: OptionalStringSchema,
  STRIPE_LIVE: FlagSchema,
  STRIPE_DO_TOPUP: FlagSchema,
  STRIPE_TOPUP_AMOUNT_CENTS: intWithDefault(DEFAULT_TOPUP_AMOUNT_CENTS),
  STRIPE_TOPUP_CURRENCY: stringWithDefault(DEFAULT_TOPUP_CURRENCY),
  ENABLE_LIVE_MODE: FlagSchema,
});

export interface IssuingConfig {
  readonly apiKey?: string;
  readonly liveRequested: boolean;
  readonly doTopup: boolean;
  readonly topupAmountCents: number;
  readonly topupCurrency: string;
  readonly liveModeEnabled: boolean;
}

/**
 * Build the issuing configuration from an environment record.
 * Amount positivity is enforced by authorizeTopup, not here.
 */
export function loadIssuingConfig(env: EnvSource): IssuingConfig {
  const parsed = IssuingEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid issuing configuration: ${formatZodIssues(parsed.error)}`,
      'INVALID_ENVIRONMENT'
    );
  }

  const vars = parsed.data;

  return Object.freeze({
    apiKey: vars.STRIPE_API_KEY,
    liveRequested: vars.STRIPE_LIVE,
    doTopup: vars.STRIPE_DO_TOPUP,
    topupAmountCents: vars.STRIPE_TOPUP_AMOUNT_CENTS,
    topupCurrency: vars.STRIPE_TOPUP_CURRENCY.toLowerCase(),
    liveModeEnabled: vars.ENABLE_LIVE_MODE,
  });
}
