import { Job, Worker } from 'bullmq';
import { connection, JOB_NAMES, QUEUE_NAMES } from '../config/queue';
import { CandidateRepository } from '../types/candidate';
import { EscalationCheckJobData, SummaryJobData } from '../types/jobs';
import { EscalationService } from '../services/escalation.service';
import { HandoffService } from '../services/handoff.service';
import { MemoryService } from '../services/memory.service';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

type TailJobData = EscalationCheckJobData | SummaryJobData;

export interface TailWorkerDeps {
  db: CandidateRepository;
  escalation: EscalationService;
  handoff: HandoffService;
  memory: MemoryService;
}

function isEscalationCheck(data: TailJobData): data is EscalationCheckJobData {
  return 'message' in data && 'window' in data;
}

/** Scored escalation after the reply went out. Never throws. */
export async function processEscalationCheck(data: EscalationCheckJobData, deps: TailWorkerDeps): Promise<boolean> {
  try {
    const candidate = await deps.db.getCandidate(data.phone);
    if (!candidate || candidate.status === 'escalated') {
      return false;
    }

    const result = await deps.escalation.runScoredCheck(data.window, data.message);
    if (!result.shouldEscalate || !result.reason) {
      return false;
    }

    return await deps.handoff.escalate(data.phone, result.reason);
  } catch (error) {
    logger.error('Escalation check job failed', { phone: data.phone, error: toError(error).message });
    return false;
  }
}

export async function processSummary(data: SummaryJobData, deps: TailWorkerDeps): Promise<boolean> {
  try {
    return await deps.memory.summarizeIfNeeded(data.phone);
  } catch (error) {
    logger.error('Summary job failed', { phone: data.phone, error: toError(error).message });
    return false;
  }
}

export async function processTailJob(job: Pick<Job<TailJobData>, 'id' | 'name' | 'data'>, deps: TailWorkerDeps): Promise<boolean> {
  if (job.name === JOB_NAMES.ESCALATION_CHECK && isEscalationCheck(job.data)) {
    return processEscalationCheck(job.data, deps);
  }
  if (job.name === JOB_NAMES.SUMMARIZE) {
    return processSummary(job.data, deps);
  }

  logger.warn('Unknown conversation tail job', { jobId: job.id, name: job.name });
  return false;
}

export function startTailWorker(deps: TailWorkerDeps): Worker<TailJobData, boolean> {
  const worker = new Worker<TailJobData, boolean>(
    QUEUE_NAMES.CONVERSATION_TAIL,
    (job) => processTailJob(job, deps),
    { connection, concurrency: 5 }
  );

  worker.on('failed', (job, err) => {
    logger.error('Conversation tail job failed', { jobId: job?.id, name: job?.name, error: err.message });
  });

  logger.info('Conversation tail worker started');
  return worker;
}
