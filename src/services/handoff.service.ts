import { Candidate, CandidateRepository, ConversationTurn, HistoryRole, isConversationTurn } from '../types/candidate';
import { JobScheduler } from '../types/jobs';
import { WhatsAppAdapter } from './whatsapp/whatsapp.adapter';
import { logger } from '../utils/logger';
import { ConflictError, NotFoundError } from '../utils/errors';

export const RESUME_KEEP_LAST = 3;

export interface EscalatedCandidate {
  name: string;
  phone_number: string;
  escalation_reason: string | null;
}

export interface ConversationOverview {
  name: string;
  surname: string;
  phone_number: string;
  status: Candidate['status'];
  last_message: string | null;
  last_sender: HistoryRole | null;
  last_updated: string;
}

/** Moves conversations between the bot and a human operator. */
export class HandoffService {
  constructor(
    private db: CandidateRepository,
    private whatsapp: WhatsAppAdapter,
    private jobs: JobScheduler
  ) {}

  /** Escalates and queues the operator alert. False when someone else already escalated. */
  async escalate(phone: string, reason: string): Promise<boolean> {
    const updated = await this.db.escalateCandidate(phone, reason);
    if (!updated) {
      logger.info('Candidate already escalated', { phone });
      return false;
    }

    logger.info('Candidate escalated', { phone, reason });
    await this.jobs.notify({ type: 'escalation', phone, name: updated.name, reason });
    return true;
  }

  async listEscalated(): Promise<EscalatedCandidate[]> {
    const candidates = await this.db.listCandidatesByStatus('escalated');
    return candidates.map((c) => ({
      name: c.name,
      phone_number: c.phone_number,
      escalation_reason: c.escalation_reason,
    }));
  }

  async listConversations(): Promise<ConversationOverview[]> {
    const candidates = await this.db.listCandidates();
    return candidates.map((c) => {
      const turns = c.history.filter(isConversationTurn);
      const last = turns.length > 0 ? turns[turns.length - 1] : null;
      return {
        name: c.name,
        surname: c.surname,
        phone_number: c.phone_number,
        status: c.status,
        last_message: last ? last.text : null,
        last_sender: last ? last.from : null,
        last_updated: c.last_updated,
      };
    });
  }

  async getHistory(phone: string): Promise<ConversationTurn[]> {
    const candidate = await this.requireCandidate(phone);
    return candidate.history.filter(isConversationTurn);
  }

  /** Sends first so a failed delivery leaves no admin entry behind. */
  async sendAdminReply(phone: string, text: string): Promise<void> {
    await this.requireCandidate(phone);
    await this.whatsapp.sendText(phone, text);
    await this.db.appendHistory(phone, [{ from: 'admin', text }]);
    logger.info('Operator reply sent', { phone });
  }

  async resume(phone: string): Promise<Candidate> {
    const candidate = await this.requireCandidate(phone);
    if (candidate.status !== 'escalated') {
      throw new ConflictError('Candidate is not escalated');
    }

    const resumed = await this.db.resumeCandidate(phone, RESUME_KEEP_LAST);
    if (!resumed) {
      throw new ConflictError('Candidate is not escalated');
    }

    logger.info('Conversation handed back to the assistant', { phone });
    return resumed;
  }

  private async requireCandidate(phone: string): Promise<Candidate> {
    const candidate = await this.db.getCandidate(phone);
    if (!candidate) {
      throw new NotFoundError('Candidate not found');
    }
    return candidate;
  }
}
