import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { captureRawBody } from './middleware/signature';
import { createWebhookRouter, WebhookRouterDeps } from './routes/webhook.routes';
import { createAdminRouter, AdminRouterDeps } from './routes/admin.routes';

export interface AppOptions {
  webhook: WebhookRouterDeps;
  admin: AdminRouterDeps;
  sentry: boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Twilio posts form-encoded; Meta posts JSON signed over the raw bytes.
  app.use('/webhook', express.urlencoded({ extended: false }));
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));

  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      max: 100,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(apiKeyAuth);

  app.use('/webhook', createWebhookRouter(options.webhook));
  app.use('/api/admin', createAdminRouter(options.admin));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  if (options.sentry) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
