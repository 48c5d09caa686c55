import { CandidateRepository } from '../types/candidate';
import { AgentResponse, ActionTaken, EscalationPolicy, IncomingMessage } from '../types/agent';
import { JobScheduler } from '../types/jobs';
import { IMMEDIATE_ESCALATION_REASON } from '../config/escalation';
import { DedupService } from './dedup.service';
import { EscalationService } from './escalation.service';
import { DialogueService } from './dialogue.service';
import { HandoffService } from './handoff.service';
import { WhatsAppAdapter } from './whatsapp/whatsapp.adapter';
import { Language, detectLanguage } from '../utils/language';
import { FIXED_REPLIES } from '../utils/prompts';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const PROCESSED_ID_LIMIT = 100;

export interface ConversationDeps {
  db: CandidateRepository;
  dedup: DedupService;
  escalation: EscalationService;
  dialogue: DialogueService;
  handoff: HandoffService;
  whatsapp: WhatsAppAdapter;
  jobs: JobScheduler;
}

/**
 * Drives one inbound message through dedup, escalation, reply generation
 * and delivery. Only the scored escalation check and summarization run
 * outside this call, as queued jobs.
 */
export class ConversationService {
  constructor(
    private deps: ConversationDeps,
    private policy: EscalationPolicy
  ) {}

  async handleMessage(incoming: IncomingMessage): Promise<AgentResponse> {
    const { db, dedup, escalation, dialogue, handoff, jobs } = this.deps;
    const { phone, text, message_id: messageId } = incoming;
    const lang = detectLanguage(text);

    if (messageId && !(await dedup.claim(messageId))) {
      logger.info('Duplicate message dropped', { phone, messageId, layer: 'cache' });
      return this.result(phone, lang, 'duplicate');
    }

    const candidate = await db.findOrCreateCandidate(phone);

    if (messageId && !(await db.recordProcessedMessage(phone, messageId, PROCESSED_ID_LIMIT))) {
      logger.info('Duplicate message dropped', { phone, messageId, layer: 'database' });
      return this.result(phone, lang, 'duplicate');
    }

    // Captured before the append so the scored check sees the prior turns plus this message.
    const window = escalation.buildWindow(candidate.history);
    const updated = await db.appendHistory(phone, [{ from: 'user', text }]);

    const matched = escalation.checkImmediate(text);
    if (matched) {
      logger.info('Immediate escalation requested', { phone, phrase: matched });
      await handoff.escalate(phone, IMMEDIATE_ESCALATION_REASON);
      const handoffText = FIXED_REPLIES.handoff[lang];
      await this.deliver(phone, handoffText);
      return this.result(phone, lang, 'escalated', handoffText);
    }

    if (updated.status === 'escalated') {
      logger.info('Conversation with operator, no automated reply', { phone });
      return this.result(phone, lang, 'paused');
    }

    const userMessages = updated.history.filter((entry) => entry.from === 'user').length;
    const sampled = escalation.shouldRunScoredCheck(userMessages);

    if (this.policy === 'before_reply' && sampled) {
      const check = await escalation.runScoredCheck(window, text);
      if (check.shouldEscalate && check.reason) {
        await handoff.escalate(phone, check.reason);
        return this.result(phone, lang, 'escalated');
      }
    }

    const output = await dialogue.generateReply(updated, text, lang);
    // Stored and re-checked in one write: an escalated candidate gets neither.
    const recorded = await db.recordBotReply(phone, output.reply);
    if (!recorded) {
      logger.info('Candidate escalated while replying, reply dropped', { phone });
      return this.result(phone, lang, 'suppressed');
    }

    await this.deliver(phone, output.reply);

    if (this.policy === 'after_reply' && sampled) {
      await jobs.scheduleEscalationCheck({ phone, message: text, window });
    }
    await jobs.scheduleSummary({ phone });

    return this.result(phone, lang, 'responded', output.reply);
  }

  /** A failed send is logged; what was stored stays stored. */
  private async deliver(phone: string, text: string): Promise<void> {
    try {
      await this.deps.whatsapp.sendText(phone, text);
    } catch (error) {
      logger.error('Failed to deliver WhatsApp message', { phone, error: toError(error).message });
    }
  }

  private result(phone: string, language: Language, action: ActionTaken, response: string | null = null): AgentResponse {
    return { success: true, phone, action_taken: action, response, language };
  }
}
