import { Job, Worker } from 'bullmq';
import { connection, QUEUE_NAMES } from '../config/queue';
import { InboundJobData } from '../types/jobs';
import { AgentResponse } from '../types/agent';
import { ConversationService } from '../services/conversation.service';
import { logger } from '../utils/logger';

export async function processInboundMessage(
  job: Pick<Job<InboundJobData>, 'id' | 'data'>,
  conversation: ConversationService
): Promise<AgentResponse> {
  logger.info('Processing inbound message', { jobId: job.id, phone: job.data.phone, channel: job.data.channel });

  const result = await conversation.handleMessage(job.data);

  logger.info('Inbound message handled', {
    jobId: job.id,
    phone: result.phone,
    action: result.action_taken,
    language: result.language,
  });
  return result;
}

export function startInboundWorker(conversation: ConversationService): Worker<InboundJobData, AgentResponse> {
  const worker = new Worker<InboundJobData, AgentResponse>(
    QUEUE_NAMES.INBOUND,
    (job) => processInboundMessage(job, conversation),
    { connection, concurrency: 10 }
  );

  worker.on('failed', (job, err) => {
    logger.error('Inbound job failed', { jobId: job?.id, phone: job?.data.phone, error: err.message });
  });

  logger.info('Inbound worker started');
  return worker;
}
