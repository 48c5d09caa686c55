import { Language } from '../utils/language';

export type Channel = 'meta' | 'twilio';

export interface IncomingMessage {
  phone: string;
  text: string;
  message_id: string | null;
  channel: Channel;
}

export type ActionTaken = 'duplicate' | 'escalated' | 'paused' | 'responded' | 'suppressed';

export interface AgentResponse {
  success: boolean;
  phone: string;
  action_taken: ActionTaken;
  response: string | null;
  language: Language;
}

export interface OrchestratorOutput {
  reply: string;
  intent: string;
  next_step: string;
  /** `{ step, flags: { wants_human, confused, frustrated }, notes }` as returned by the model. */
  state_update: Record<string, unknown> | null;
  /** True when the model output needed a fallback or an unwrap. */
  sanitized: boolean;
}

export type EscalationPolicy = 'after_reply' | 'before_reply';
