import { ConversationTurn } from './candidate';
import { IncomingMessage } from './agent';

export type InboundJobData = IncomingMessage;

export interface EscalationCheckJobData {
  phone: string;
  message: string;
  /** Conversation turns captured before the reply was generated. */
  window: ConversationTurn[];
}

export interface SummaryJobData {
  phone: string;
}

export interface NotificationJobData {
  type: 'escalation';
  phone: string;
  name: string | null;
  reason: string;
}

/** Deferred work the conversation path hands off to the queues. */
export interface JobScheduler {
  scheduleEscalationCheck(data: EscalationCheckJobData): Promise<void>;
  scheduleSummary(data: SummaryJobData): Promise<void>;
  notify(data: NotificationJobData): Promise<void>;
}
