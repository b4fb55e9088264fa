/**
 * Payment Processor - HTTP App
 *
 * API SURFACE:
 * - GET  /health
 * - POST /webhooks/stripe
 * - POST /webhooks/paypal
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { AdapterMode } from '../shared/types';
import { createWebhookRoutes, WebhookDependencies } from './routes/webhook.routes';

export interface AppDependencies extends WebhookDependencies {
  readonly mode: AdapterMode;
  readonly rateLimitPerMinute?: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Health check (public)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'OK',
      service: 'payment-processor',
      mode: deps.mode,
      timestamp: new Date().toISOString(),
    });
  });

  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: deps.rateLimitPerMinute ?? 120,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use('/webhooks', limiter, createWebhookRoutes(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[Error]', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
