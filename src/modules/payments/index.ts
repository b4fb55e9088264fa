/**
 * Payment Processor - Payments Module Export
 */

export { PaymentGateway, WebhookSignature } from './payment.port';
export { PaymentProcessor } from './payment.service';

export { MockPaymentAdapter, signMockPayload } from './adapters/mock-payment.adapter';
export {
  StripePaymentAdapter,
  StripePaymentAdapterOptions,
  StripePaymentClient,
  createStripePaymentClient,
} from './adapters/stripe-payment.adapter';
export {
  PayPalPaymentAdapter,
  PayPalPaymentAdapterOptions,
  PAYPAL_SANDBOX_BASE_URL,
  PAYPAL_LIVE_BASE_URL,
  formatCents,
} from './adapters/paypal-payment.adapter';
