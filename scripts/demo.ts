/**
 * Payment Processor - Charge Demo
 * Charge 500 cents on a fake source, then refund it in full (mock adapter).
 *
 * RUN: npx ts-node scripts/demo.ts
 */

import { MockPaymentAdapter, PaymentProcessor } from '../src/modules/payments';

async function runDemo(): Promise<void> {
  const processor = new PaymentProcessor(new MockPaymentAdapter());

  console.log('Charging 500 cents (USD) on fake source `tok_visa`...');
  const charge = await processor.charge({
    amountCents: 500,
    currency: 'USD',
    source: 'tok_visa',
    description: 'Demo charge',
  });
  console.log('Charge result:', charge);

  console.log('Refunding the charge (full refund)...');
  const refund = await processor.refund(charge.id);
  console.log('Refund result:', refund);
}

runDemo().catch((error) => {
  console.error('[Demo] Failed:', error);
  process.exit(1);
});
