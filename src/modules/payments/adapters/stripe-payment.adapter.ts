/**
 * Payment Processor - Stripe Payment Adapter
 * Charges API + Stripe-Signature webhook verification
 *
 * The legacy Charges API keeps the charge/refund shape simple;
 * PaymentIntents are the production choice for new integrations.
 */

import Stripe from 'stripe';
import { STRIPE_API_VERSION } from '../../../config';
import { AdapterError } from '../../../shared/errors';
import { ChargeInput, ChargeRecord, ChargeStatus, RefundRecord } from '../../../shared/types';
import { PaymentGateway, WebhookSignature } from '../payment.port';

export type StripeChargeLike = Pick<
  Stripe.Charge,
  'id' | 'amount' | 'amount_refunded' | 'currency' | 'description' | 'status' | 'refunded'
>;

export type StripeRefundLike = Pick<Stripe.Refund, 'id' | 'amount' | 'status'>;

/**
 * The slice of the Stripe SDK this adapter calls
 */
export interface StripePaymentClient {
  createCharge(params: Stripe.ChargeCreateParams): Promise<StripeChargeLike>;
  createRefund(params: Stripe.RefundCreateParams): Promise<StripeRefundLike>;
  constructEvent(payload: string | Buffer, header: string, secret: string): Stripe.Event;
}

export function createStripePaymentClient(stripe: Stripe): StripePaymentClient {
  return {
    createCharge: (params) => stripe.charges.create(params),
    createRefund: (params) => stripe.refunds.create(params),
    constructEvent: (payload, header, secret) => stripe.webhooks.constructEvent(payload, header, secret),
  };
}

export interface StripePaymentAdapterOptions {
  readonly apiKey: string;
  readonly client?: StripePaymentClient;
}

export class StripePaymentAdapter implements PaymentGateway {
  readonly name = 'STRIPE_PAYMENTS';

  private readonly client: StripePaymentClient;

  constructor(options: StripePaymentAdapterOptions) {
    this.client =
      options.client ??
      createStripePaymentClient(new Stripe(options.apiKey, { apiVersion: STRIPE_API_VERSION }));
  }

  async charge(input: ChargeInput): Promise<ChargeRecord> {
    const charge = await this.call('charge', () =>
      this.client.createCharge({
        amount: input.amountCents,
        currency: input.currency.toLowerCase(),
        source: input.source,
        description: input.description,
      })
    );
    console.log(`[StripePayments] Charge created: ${charge.id}`);

    return {
      id: charge.id,
      amount_cents: charge.amount,
      currency: charge.currency.toUpperCase(),
      source: input.source,
      description: charge.description ?? '',
      status: charge.refunded ? 'refunded' : charge.status,
      refunded_cents: charge.amount_refunded,
      raw_response: charge,
    };
  }

  async refund(chargeId: string, amountCents?: number): Promise<RefundRecord> {
    const params: Stripe.RefundCreateParams = { charge: chargeId };
    if (amountCents !== undefined) {
      params.amount = amountCents;
    }

    const refund = await this.call('refund', () => this.client.createRefund(params));
    console.log(`[StripePayments] Refund created: ${refund.id}`);

    return {
      id: chargeId,
      refunded_cents: refund.amount,
      status: refundStatus(refund.status),
      raw_response: refund,
    };
  }

  /**
   * Header format: t=<timestamp>,v1=<signature>[,v0=...]
   */
  async verifyWebhook(payload: string | Buffer, signature: WebhookSignature, secret: string): Promise<boolean> {
    if (typeof signature !== 'string' || !signature || !secret) {
      return false;
    }

    try {
      this.client.constructEvent(payload, signature, secret);
      return true;
    } catch (error) {
      console.warn('[StripePayments] Webhook signature rejected:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  /**
   * Verify and parse a webhook in one step (used by the webhook routes)
   */
  constructEvent(payload: string | Buffer, signature: string, secret: string): Stripe.Event {
    return this.client.constructEvent(payload, signature, secret);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof Stripe.errors.StripeError) {
        const retryable =
          error instanceof Stripe.errors.StripeConnectionError ||
          error instanceof Stripe.errors.StripeRateLimitError;
        console.error(`[StripePayments] ${operation} failed:`, error.message);
        throw new AdapterError(`stripe api error: ${error.message}`, error.code ?? 'STRIPE_ERROR', retryable, {
          cause: error,
        });
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[StripePayments] ${operation} failed:`, message);
      throw new AdapterError(`stripe api error: ${message}`, 'STRIPE_ERROR', false, { cause: error });
    }
  }
}

function refundStatus(status: string | null): ChargeStatus {
  switch (status) {
    case 'succeeded':
      return 'succeeded';
    case 'failed':
    case 'canceled':
      return 'failed';
    default:
      return 'pending';
  }
}
