export type CandidateStatus = 'sent' | 'replied' | 'escalated';

export interface UserTurn {
  from: 'user';
  text: string;
}

export interface BotTurn {
  from: 'bot';
  text: string;
}

export interface AdminTurn {
  from: 'admin';
  text: string;
}

/** Structured short-term memory written by the dialogue orchestrator, stored as JSON text. */
export interface StateSnapshot {
  from: 'state';
  text: string;
}

export interface SummaryEntry {
  from: 'summary';
  text: string;
}

export type ConversationTurn = UserTurn | BotTurn | AdminTurn;
export type MemoryEntry = StateSnapshot | SummaryEntry;
export type HistoryEntry = ConversationTurn | MemoryEntry;
export type HistoryRole = HistoryEntry['from'];

export function isConversationTurn(entry: HistoryEntry): entry is ConversationTurn {
  return entry.from === 'user' || entry.from === 'bot' || entry.from === 'admin';
}

export interface Candidate {
  id: string;
  name: string;
  surname: string;
  phone_number: string;
  company_name: string | null;
  job_position: string | null;
  status: CandidateStatus;
  escalation_reason: string | null;
  history: HistoryEntry[];
  processed_message_ids: string[];
  created_at: string;
  last_updated: string;
}

export interface NewCandidate {
  name: string;
  surname: string;
  phone_number: string;
  company_name?: string | null;
  job_position?: string | null;
}

/**
 * Persistence contract for candidates. Every mutating method is a single
 * atomic write so concurrent deliveries for one phone cannot interleave
 * inside an operation.
 */
export interface CandidateRepository {
  getCandidate(phone: string): Promise<Candidate | null>;
  findOrCreateCandidate(phone: string): Promise<Candidate>;
  /** Returns null when the phone number is already taken. */
  createCandidate(data: NewCandidate): Promise<Candidate | null>;
  /** Records the id unless already present; false means it was a duplicate. */
  recordProcessedMessage(phone: string, messageId: string, limit: number): Promise<boolean>;
  appendHistory(phone: string, entries: HistoryEntry[]): Promise<Candidate>;
  /** Appends a bot turn and moves the status to `replied`. Returns null, storing nothing, once escalated. */
  recordBotReply(phone: string, text: string): Promise<Candidate | null>;
  /** Returns null when the candidate was already escalated. */
  escalateCandidate(phone: string, reason: string): Promise<Candidate | null>;
  /** Returns null unless the candidate was escalated. */
  resumeCandidate(phone: string, keepLast: number): Promise<Candidate | null>;
  listCandidates(): Promise<Candidate[]>;
  listCandidatesByStatus(status: CandidateStatus): Promise<Candidate[]>;
}
