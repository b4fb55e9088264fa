/**
 * Payment Processor - Payment Gateway Port
 * Charges, refunds and webhook signature checks
 *
 * Implementations:
 * - MockPaymentAdapter (in-memory, HMAC-SHA256 webhooks)
 * - StripePaymentAdapter (Charges API, Stripe-Signature webhooks)
 * - PayPalPaymentAdapter (Orders API, verify-webhook-signature)
 */

import {
  ChargeInput,
  ChargeRecord,
  PayPalSignatureHeaders,
  RefundRecord,
} from '../../shared/types';

/**
 * Stripe and the mock sign with a single header string; PayPal sends a set of
 * transmission headers.
 */
export type WebhookSignature = string | PayPalSignatureHeaders;

export interface PaymentGateway {
  readonly name: string;

  charge(input: ChargeInput): Promise<ChargeRecord>;

  /**
   * Refund a charge; without an amount the remaining balance is refunded
   */
  refund(chargeId: string, amountCents?: number): Promise<RefundRecord>;

  /**
   * @param secret - signing secret (Stripe, mock) or webhook id (PayPal)
   */
  verifyWebhook(payload: string | Buffer, signature: WebhookSignature, secret: string): Promise<boolean>;
}
