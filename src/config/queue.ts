import { Queue } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import {
  EscalationCheckJobData,
  InboundJobData,
  JobScheduler,
  NotificationJobData,
  SummaryJobData,
} from '../types/jobs';

export const QUEUE_NAMES = {
  INBOUND: 'inbound',
  CONVERSATION_TAIL: 'conversation-tail',
  NOTIFICATION: 'notifications',
} as const;

export const JOB_NAMES = {
  INBOUND_MESSAGE: 'inbound-message',
  ESCALATION_CHECK: 'escalation-check',
  SUMMARIZE: 'summarize',
  ESCALATION_ALERT: 'escalation-alert',
} as const;

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
}

export function parseRedisUrl(url: string): RedisConnection {
  const parsed = new URL(url);
  const connection: RedisConnection = {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };

  if (parsed.protocol === 'rediss:') {
    connection.tls = {};
  }

  return connection;
}

export const connection = parseRedisUrl(env.REDIS_URL);

// A retried inbound job would be dropped by the dedup claim, so inbound and tail jobs run once.
export const inboundQueue = new Queue<InboundJobData>(QUEUE_NAMES.INBOUND, {
  connection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: 1000,
    removeOnFail: 5000,
  },
});

export const conversationTailQueue = new Queue<EscalationCheckJobData | SummaryJobData>(QUEUE_NAMES.CONVERSATION_TAIL, {
  connection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: 1000,
    removeOnFail: 1000,
  },
});

export const notificationQueue = new Queue<NotificationJobData>(QUEUE_NAMES.NOTIFICATION, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

inboundQueue.on('error', (err: Error) => {
  logger.error('Queue error', { queue: QUEUE_NAMES.INBOUND, error: err.message });
});
conversationTailQueue.on('error', (err: Error) => {
  logger.error('Queue error', { queue: QUEUE_NAMES.CONVERSATION_TAIL, error: err.message });
});
notificationQueue.on('error', (err: Error) => {
  logger.error('Queue error', { queue: QUEUE_NAMES.NOTIFICATION, error: err.message });
});

/** Rethrows: the webhook answers 503 when the message could not be queued. */
export async function addInboundMessageJob(data: InboundJobData): Promise<void> {
  try {
    await inboundQueue.add(JOB_NAMES.INBOUND_MESSAGE, data);
    logger.info('Inbound message queued', { phone: data.phone, messageId: data.message_id, channel: data.channel });
  } catch (error) {
    logger.error('Failed to queue inbound message', { phone: data.phone, error: toError(error).message });
    throw error;
  }
}

export async function addEscalationCheckJob(data: EscalationCheckJobData): Promise<void> {
  try {
    await conversationTailQueue.add(JOB_NAMES.ESCALATION_CHECK, data);
    logger.debug('Escalation check queued', { phone: data.phone });
  } catch (error) {
    logger.error('Failed to queue escalation check', { phone: data.phone, error: toError(error).message });
  }
}

export async function addSummaryJob(data: SummaryJobData): Promise<void> {
  try {
    await conversationTailQueue.add(JOB_NAMES.SUMMARIZE, data);
    logger.debug('Summary check queued', { phone: data.phone });
  } catch (error) {
    logger.error('Failed to queue summary check', { phone: data.phone, error: toError(error).message });
  }
}

export async function addNotificationJob(data: NotificationJobData): Promise<void> {
  try {
    await notificationQueue.add(JOB_NAMES.ESCALATION_ALERT, data);
    logger.info('Notification job queued', { type: data.type, phone: data.phone });
  } catch (error) {
    logger.error('Failed to queue notification job', { phone: data.phone, error: toError(error).message });
  }
}

export const queueJobScheduler: JobScheduler = {
  scheduleEscalationCheck: addEscalationCheckJob,
  scheduleSummary: addSummaryJob,
  notify: addNotificationJob,
};
