/**
 * Payment Processor - Webhook Routes
 * Incoming Stripe and PayPal notifications
 *
 * Both routes read the RAW body: signatures are computed over the exact bytes.
 */

import express, { Router, Request, Response } from 'express';
import { AdapterError } from '../../shared/errors';
import { PayPalSignatureHeaders } from '../../shared/types';
import { PaymentGateway } from '../../modules/payments';

export interface StripeWebhookBinding {
  readonly gateway: PaymentGateway;
  readonly secret: string;
}

export interface PayPalWebhookBinding {
  readonly gateway: PaymentGateway;
  readonly webhookId: string;
}

export interface WebhookDependencies {
  readonly stripe: StripeWebhookBinding | null;
  readonly paypal: PayPalWebhookBinding | null;
}

function paypalHeaders(req: Request): PayPalSignatureHeaders {
  return {
    'paypal-transmission-id': req.header('paypal-transmission-id'),
    'paypal-transmission-time': req.header('paypal-transmission-time'),
    'paypal-cert-url': req.header('paypal-cert-url'),
    'paypal-auth-algo': req.header('paypal-auth-algo'),
    'paypal-transmission-sig': req.header('paypal-transmission-sig'),
  };
}

function rawBody(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

export function createWebhookRoutes(deps: WebhookDependencies): Router {
  const router = Router();
  router.use(express.raw({ type: '*/*', limit: '1mb' }));

  /**
   * POST /webhooks/stripe
   * Stripe-Signature: t=<timestamp>,v1=<signature>
   */
  router.post('/stripe', async (req: Request, res: Response) => {
    if (!deps.stripe) {
      console.warn('[Webhook] Stripe webhook received but STRIPE_WEBHOOK_SECRET / STRIPE_API_KEY not configured');
      res.status(503).json({ error: 'Webhook not configured' });
      return;
    }

    const signature = req.header('stripe-signature');
    if (!signature) {
      res.status(400).json({ error: 'Missing stripe-signature header' });
      return;
    }

    try {
      const ok = await deps.stripe.gateway.verifyWebhook(rawBody(req), signature, deps.stripe.secret);
      if (!ok) {
        console.error('[Webhook] Invalid Stripe signature');
        res.status(400).json({ ok: false });
        return;
      }

      console.log(`[Webhook] Stripe event verified (${rawBody(req).length} bytes)`);
      res.json({ ok: true });
    } catch (error) {
      console.error('[Webhook] Error processing Stripe webhook:', error);
      res.status(500).json({ ok: false, error: error instanceof Error ? error.message : 'Unknown error' });
    }
  });

  /**
   * POST /webhooks/paypal
   * Verified through PayPal's verify-webhook-signature endpoint
   */
  router.post('/paypal', async (req: Request, res: Response) => {
    if (!deps.paypal) {
      console.warn('[Webhook] PayPal webhook received but PayPal credentials not configured');
      res.status(503).json({ error: 'Webhook not configured' });
      return;
    }

    try {
      const ok = await deps.paypal.gateway.verifyWebhook(rawBody(req), paypalHeaders(req), deps.paypal.webhookId);
      if (!ok) {
        console.error('[Webhook] Invalid PayPal signature');
        res.status(400).json({ ok: false });
        return;
      }

      console.log('[Webhook] PayPal event verified');
      res.json({ ok: true });
    } catch (error) {
      console.error('[Webhook] Error processing PayPal webhook:', error);

      if (error instanceof AdapterError) {
        res.status(502).json({ ok: false, error: error.message });
        return;
      }

      res.status(500).json({ ok: false, error: error instanceof Error ? error.message : 'Unknown error' });
    }
  });

  return router;
}
