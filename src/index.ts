/**
 * Payment Processor - Main Entry Point
 * Webhook receiver + issuing mode report
 *
 * Configuration is read ONCE here and passed down; nothing below reads process.env.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadIssuingConfig, loadServerConfig } from './config';
import { ConfigurationError } from './shared/errors';
import { authorizeTopup, classifyCredential, maskCredential, selectAdapter } from './modules/issuing';
import { PayPalPaymentAdapter, StripePaymentAdapter } from './modules/payments';
import { createApp } from './api';

function bootstrap(): void {
  console.log('='.repeat(60));
  console.log('  PAYMENT PROCESSOR');
  console.log('  Charges, refunds, webhooks & virtual card issuing');
  console.log('='.repeat(60));

  const issuingConfig = loadIssuingConfig(process.env);
  const serverConfig = loadServerConfig(process.env);

  // Safety gate: a live request with a test key stops here
  const gateway = selectAdapter(issuingConfig);
  const topupAuthorized = authorizeTopup(issuingConfig);

  if (issuingConfig.apiKey && classifyCredential(issuingConfig.apiKey) === 'unrecognized' && gateway.mode === 'live') {
    console.warn(`[Boot] Unrecognized key shape ${maskCredential(issuingConfig.apiKey)}; live adapter selected as requested`);
  }
  console.log(`[Boot] Issuing adapter: ${gateway.name} (${gateway.mode.toUpperCase()})`);
  console.log(
    topupAuthorized
      ? `[Boot] Top-ups AUTHORIZED: ${issuingConfig.topupAmountCents} ${issuingConfig.topupCurrency} cents`
      : '[Boot] Top-ups disabled'
  );

  const stripe =
    serverConfig.stripeApiKey && serverConfig.stripeWebhookSecret
      ? {
          gateway: new StripePaymentAdapter({ apiKey: serverConfig.stripeApiKey }),
          secret: serverConfig.stripeWebhookSecret,
        }
      : null;

  const paypal = serverConfig.paypal
    ? {
        gateway: new PayPalPaymentAdapter({
          clientId: serverConfig.paypal.clientId,
          clientSecret: serverConfig.paypal.clientSecret,
          sandbox: serverConfig.paypal.sandbox,
        }),
        webhookId: serverConfig.paypal.webhookId,
      }
    : null;

  const app = createApp({ mode: gateway.mode, stripe, paypal });

  const server = app.listen(serverConfig.port, () => {
    console.log(`\n[Boot] Server listening on port ${serverConfig.port}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${serverConfig.port}/health`);
    console.log(`  - Stripe: http://localhost:${serverConfig.port}/webhooks/stripe ${stripe ? '' : '(not configured)'}`);
    console.log(`  - PayPal: http://localhost:${serverConfig.port}/webhooks/paypal ${paypal ? '' : '(not configured)'}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  bootstrap();
} catch (error) {
  if (error instanceof ConfigurationError) {
    console.error(`[Boot] FATAL configuration error: ${error.message}`);
  } else {
    console.error('[Boot] Fatal error during startup:', error);
  }
  process.exit(1);
}
