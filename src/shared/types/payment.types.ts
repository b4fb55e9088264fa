/**
 * Payment Processor - Charge & Refund Types
 */

export type ChargeStatus = 'succeeded' | 'refunded' | 'pending' | 'failed';

export interface ChargeInput {
  readonly amountCents: number;
  readonly currency: string;
  readonly source: string;            // Card token / payment source
  readonly description?: string;
}

export interface ChargeRecord {
  readonly id: string;
  readonly amount_cents: number;
  readonly currency: string;
  readonly source: string;
  readonly description: string;
  readonly status: ChargeStatus;
  readonly refunded_cents: number;
  readonly raw_response?: unknown;    // Gateway-specific response
}

export interface RefundRecord {
  readonly id: string;                // Charge id (or capture id for PayPal)
  readonly refunded_cents: number;
  readonly status: ChargeStatus | 'not_found';
  readonly raw_response?: unknown;
}

/**
 * PayPal transmission headers used for webhook verification
 */
export interface PayPalSignatureHeaders {
  readonly 'paypal-transmission-id'?: string;
  readonly 'paypal-transmission-time'?: string;
  readonly 'paypal-cert-url'?: string;
  readonly 'paypal-auth-algo'?: string;
  readonly 'paypal-transmission-sig'?: string;
}
