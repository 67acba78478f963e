import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import type { AppServices } from './container';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { captureRawBody } from './middleware/webhookSignature';
import { createWebhookRouter } from './routes/webhook.routes';
import { createChatRouter } from './routes/chat.routes';
import { createCustomerRouter } from './routes/customer.routes';
import { createReferralRouter } from './routes/referral.routes';
import { createAdminRouter } from './routes/admin.routes';
import { createAnalyticsRouter } from './routes/analytics.routes';

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Twilio posts form-encoded; Meta posts JSON signed over the raw bytes
  app.use('/webhook', express.urlencoded({ extended: false }));
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  app.use(apiKeyAuth);

  app.use('/webhook', createWebhookRouter(services));
  app.use('/api/chats', createChatRouter(services));
  app.use('/api/customers', createCustomerRouter(services));
  app.use('/api/referrals', createReferralRouter(services));
  app.use('/api/admin', createAdminRouter(services));
  app.use('/api/analytics', createAnalyticsRouter(services));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
