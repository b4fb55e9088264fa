/**
 * Payment Processor - Mock Payment Adapter
 * In-memory charges for local development and tests
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AdapterError } from '../../../shared/errors';
import { ChargeInput, ChargeRecord, ChargeStatus, RefundRecord } from '../../../shared/types';
import { PaymentGateway, WebhookSignature } from '../payment.port';

interface MutableCharge {
  id: string;
  amount_cents: number;
  currency: string;
  source: string;
  description: string;
  status: ChargeStatus;
  refunded_cents: number;
}

/**
 * Hex HMAC-SHA256 of the payload, as the mock expects it in the signature header
 */
export function signMockPayload(payload: string | Buffer, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}

export class MockPaymentAdapter implements PaymentGateway {
  readonly name = 'PAYMENTS_MOCK';

  private readonly charges: Map<string, MutableCharge> = new Map();

  async charge(input: ChargeInput): Promise<ChargeRecord> {
    const charge: MutableCharge = {
      id: `ch_${uuidv4().replace(/-/g, '').slice(0, 12)}`,
      amount_cents: input.amountCents,
      currency: input.currency,
      source: input.source,
      description: input.description ?? '',
      status: 'succeeded',
      refunded_cents: 0,
    };
    this.charges.set(charge.id, charge);

    console.log(`[PAYMENTS MOCK] Charge ${charge.id}: ${charge.amount_cents} ${charge.currency} cents`);
    return { ...charge };
  }

  async refund(chargeId: string, amountCents?: number): Promise<RefundRecord> {
    const charge = this.charges.get(chargeId);
    if (!charge) {
      return { id: chargeId, refunded_cents: 0, status: 'not_found' };
    }

    const remaining = charge.amount_cents - charge.refunded_cents;
    if (amountCents !== undefined && amountCents > remaining) {
      throw new AdapterError(
        `refund of ${amountCents} cents exceeds remaining ${remaining} cents on ${chargeId}`,
        'INVALID_AMOUNT'
      );
    }

    const amount = amountCents ?? remaining;
    charge.refunded_cents += amount;
    if (charge.refunded_cents >= charge.amount_cents) {
      charge.status = 'refunded';
    }

    console.log(`[PAYMENTS MOCK] Refund ${chargeId}: ${amount} cents (total ${charge.refunded_cents})`);
    return { id: chargeId, refunded_cents: charge.refunded_cents, status: charge.status };
  }

  async verifyWebhook(payload: string | Buffer, signature: WebhookSignature, secret: string): Promise<boolean> {
    if (typeof signature !== 'string') {
      return false;
    }

    const expected = Buffer.from(signMockPayload(payload, secret), 'utf8');
    const received = Buffer.from(signature, 'utf8');

    return expected.length === received.length && timingSafeEqual(expected, received);
  }
}
