/**
 * Payment Processor - Webhook Server Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/errors';
import {
  EnvSource,
  OptionalStringSchema,
  flagWithDefault,
  formatZodIssues,
  intWithDefault,
} from './env';

export const DEFAULT_PORT = 3002;

const ServerEnvSchema = z.object({
  PORT: intWithDefault(DEFAULT_PORT),
  STRIPE_API_KEY: OptionalStringSchema,
  STRIPE_WEBHOOK_SECRET: OptionalStringSchema,
  PAYPAL_CLIENT_ID: OptionalStringSchema,
  PAYPAL_CLIENT_SECRET: OptionalStringSchema,
  PAYPAL_WEBHOOK_ID: OptionalStringSchema,
  // Sandbox unless explicitly set to something other than a truthy flag
  PAYPAL_SANDBOX: flagWithDefault(true),
});

export interface PayPalCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly webhookId: string;
  readonly sandbox: boolean;
}

export interface ServerConfig {
  readonly port: number;
  readonly stripeApiKey?: string;
  readonly stripeWebhookSecret?: string;
  readonly paypal: PayPalCredentials | null;   // null: PayPal webhooks disabled
}

export function loadServerConfig(env: EnvSource): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid server configuration: ${formatZodIssues(parsed.error)}`,
      'INVALID_ENVIRONMENT'
    );
  }

  const vars = parsed.data;

  if (vars.PORT <= 0 || vars.PORT > 65535) {
    throw new ConfigurationError(`PORT out of range: ${vars.PORT}`, 'INVALID_PORT');
  }

  const paypal =
    vars.PAYPAL_CLIENT_ID && vars.PAYPAL_CLIENT_SECRET
      ? Object.freeze({
          clientId: vars.PAYPAL_CLIENT_ID,
          clientSecret: vars.PAYPAL_CLIENT_SECRET,
          webhookId: vars.PAYPAL_WEBHOOK_ID ?? '',
          sandbox: vars.PAYPAL_SANDBOX,
        })
      : null;

  return Object.freeze({
    port: vars.PORT,
    stripeApiKey: vars.STRIPE_API_KEY,
    stripeWebhookSecret: vars.STRIPE_WEBHOOK_SECRET,
    paypal,
  });
}
