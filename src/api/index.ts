/**
 * Payment Processor - API Module Export
 */

export { createApp, AppDependencies } from './server';
export {
  createWebhookRoutes,
  WebhookDependencies,
  StripeWebhookBinding,
  PayPalWebhookBinding,
} from './routes/webhook.routes';
