import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis } from './config/redis';
import { addInboundMessageJob } from './config/queue';
import { createAppContext } from './context';
import { createApp } from './app';
import { startInboundWorker } from './workers/inbound.worker';
import { startTailWorker } from './workers/tail.worker';
import { startNotificationWorker } from './workers/notification.worker';
import { logger } from './utils/logger';
import { toError } from './utils/errors';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start(): Promise<void> {
  await connectRedis();

  const ctx = createAppContext(env);

  startInboundWorker(ctx.conversation);
  startTailWorker({ db: ctx.db, escalation: ctx.escalation, handoff: ctx.handoff, memory: ctx.memory });
  startNotificationWorker({ email: ctx.email, adminEmail: env.ADMIN_ALERT_EMAIL });

  const app = createApp({
    webhook: {
      enqueue: addInboundMessageJob,
      verifyToken: env.WHATSAPP_VERIFY_TOKEN,
      appSecret: env.WHATSAPP_APP_SECRET,
      twilio: {
        authToken: env.TWILIO_AUTH_TOKEN,
        baseUrl: env.WEBHOOK_BASE_URL,
        enabled: env.NODE_ENV !== 'development',
      },
    },
    admin: { handoff: ctx.handoff, importer: ctx.importer, analytics: ctx.analytics },
    sentry: Boolean(env.SENTRY_DSN),
  });

  app.listen(parseInt(env.PORT, 10), () => {
    logger.info(`Server running on port ${env.PORT}`, {
      env: env.NODE_ENV,
      whatsapp: env.WHATSAPP_PROVIDER,
      llm: env.LLM_PROVIDER,
      escalationPolicy: env.ESCALATION_POLICY,
    });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: toError(error).message });
  process.exit(1);
});
