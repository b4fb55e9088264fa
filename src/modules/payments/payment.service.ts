/**
 * Payment Processor - Payment Service
 * Thin validating wrapper around a PaymentGateway
 */

import { PaymentError } from '../../shared/errors';
import { ChargeInput, ChargeRecord, RefundRecord } from '../../shared/types';
import { PaymentGateway, WebhookSignature } from './payment.port';

export class PaymentProcessor {
  constructor(private readonly gateway: PaymentGateway) {}

  get gatewayName(): string {
    return this.gateway.name;
  }

  async charge(input: ChargeInput): Promise<ChargeRecord> {
    if (!Number.isInteger(input.amountCents) || input.amountCents <= 0) {
      throw new PaymentError('amount_cents must be > 0', 'INVALID_AMOUNT');
    }
    if (!input.currency) {
      throw new PaymentError('currency required', 'CURRENCY_REQUIRED');
    }
    return this.gateway.charge(input);
  }

  async refund(chargeId: string, amountCents?: number): Promise<RefundRecord> {
    if (!chargeId) {
      throw new PaymentError('charge_id required', 'CHARGE_ID_REQUIRED');
    }
    if (amountCents !== undefined && (!Number.isInteger(amountCents) || amountCents <= 0)) {
      throw new PaymentError('refund amount_cents must be > 0', 'INVALID_AMOUNT');
    }
    return this.gateway.refund(chargeId, amountCents);
  }

  async verifyWebhook(payload: string | Buffer, signature: WebhookSignature, secret: string): Promise<boolean> {
    return this.gateway.verifyWebhook(payload, signature, secret);
  }
}
