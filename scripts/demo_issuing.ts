/**
 * Payment Processor - Virtual Card Issuing Demo
 *
 * Mock by default. Live Stripe Issuing only with STRIPE_API_KEY + STRIPE_LIVE=1;
 * real top-ups only with STRIPE_DO_TOPUP=1 as well.
 *
 * RUN: npx ts-node scripts/demo_issuing.ts
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { loadIssuingConfig } from '../src/config';
import { ConfigurationError } from '../src/shared/errors';
import { IssuingProcessor, runIssuingFlow, selectAdapter } from '../src/modules/issuing';

async function runDemo(): Promise<void> {
  const config = loadIssuingConfig(process.env);
  const gateway = selectAdapter(config);

  console.log('='.repeat(60));
  console.log(`  ISSUING DEMO - ${gateway.mode.toUpperCase()} MODE (${gateway.name})`);
  console.log('='.repeat(60));

  const result = await runIssuingFlow(new IssuingProcessor(gateway), config, {
    name: 'Alice Example',
    email: 'alice@example.com',
    billing: {
      line1: '123 Main Street',
      city: 'San Francisco',
      state: 'CA',
      postal_code: '94111',
      country: 'US',
    },
    currency: 'USD',
    initialBalanceCents: 1000,
  });

  console.log('Cardholder:', result.cardholder);
  console.log('Card:', result.card);
  console.log('Top-up:', result.topup ?? '(skipped)');
  console.log('Statuses:', result.statuses.join(' -> '));
}

runDemo().catch((error) => {
  if (error instanceof ConfigurationError) {
    console.error(`[Demo] Configuration error: ${error.message}`);
  } else {
    console.error('[Demo] Failed:', error);
  }
  process.exit(1);
});
