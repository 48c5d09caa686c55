import { Job, Worker } from 'bullmq';
import { connection, QUEUE_NAMES } from '../config/queue';
import { NotificationJobData } from '../types/jobs';
import { SendGridAdapter } from '../services/email/sendgrid.adapter';
import { logger } from '../utils/logger';

export interface NotificationDeps {
  email: SendGridAdapter;
  adminEmail?: string;
}

export function buildEscalationEmail(data: NotificationJobData): { subject: string; text: string } {
  const name = data.name || 'Unknown';
  return {
    subject: `[Escalation Alert] ${name} (${data.phone})`,
    text: [
      'A conversation needs a human operator.',
      '',
      `Name: ${name}`,
      `Phone: ${data.phone}`,
      `Reason: ${data.reason}`,
    ].join('\n'),
  };
}

/** Throws on a SendGrid failure so BullMQ retries the alert. */
export async function processNotification(
  job: Pick<Job<NotificationJobData>, 'id' | 'data' | 'attemptsMade'>,
  deps: NotificationDeps
): Promise<void> {
  const { type, phone } = job.data;
  logger.info('Processing notification', { type, phone, attempt: job.attemptsMade + 1 });

  if (!deps.adminEmail) {
    logger.warn('ADMIN_ALERT_EMAIL not set, escalation alert not sent', { phone });
    return;
  }

  const { subject, text } = buildEscalationEmail(job.data);
  await deps.email.sendEmail(deps.adminEmail, subject, text);
}

export function startNotificationWorker(deps: NotificationDeps): Worker<NotificationJobData> {
  const worker = new Worker<NotificationJobData>(
    QUEUE_NAMES.NOTIFICATION,
    (job) => processNotification(job, deps),
    {
      connection,
      concurrency: 10,
      limiter: { max: 20, duration: 1000 },
    }
  );

  worker.on('completed', (job) => {
    logger.info('Notification job completed', { jobId: job.id, type: job.data.type });
  });

  worker.on('failed', (job, err) => {
    logger.error('Notification job failed', {
      jobId: job?.id,
      type: job?.data.type,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  logger.info('Notification worker started');
  return worker;
}
