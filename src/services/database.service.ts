import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { query } from '../config/database';
import {
  Candidate,
  CandidateRepository,
  CandidateStatus,
  HistoryEntry,
  NewCandidate,
} from '../types/candidate';
import { logger } from '../utils/logger';

const historyEntrySchema = z.discriminatedUnion('from', [
  z.object({ from: z.literal('user'), text: z.string() }),
  z.object({ from: z.literal('bot'), text: z.string() }),
  z.object({ from: z.literal('admin'), text: z.string() }),
  z.object({ from: z.literal('state'), text: z.string() }),
  z.object({ from: z.literal('summary'), text: z.string() }),
]);

const timestamp = z.union([z.date(), z.string()]).transform((value) =>
  value instanceof Date ? value.toISOString() : value
);

const candidateRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  surname: z.string(),
  phone_number: z.string(),
  company_name: z.string().nullable(),
  job_position: z.string().nullable(),
  status: z.enum(['sent', 'replied', 'escalated']),
  escalation_reason: z.string().nullable(),
  history: z.array(z.unknown()),
  processed_message_ids: z.array(z.unknown()),
  created_at: timestamp,
  last_updated: timestamp,
});

/** Maps a `candidates` row, dropping history records that do not match the union. */
export function toCandidate(row: unknown): Candidate {
  const parsed = candidateRowSchema.parse(row);

  const history: HistoryEntry[] = [];
  for (const raw of parsed.history) {
    const entry = historyEntrySchema.safeParse(raw);
    if (entry.success) {
      history.push(entry.data);
    } else {
      logger.warn('Dropping malformed history entry', { phone: parsed.phone_number });
    }
  }

  return {
    ...parsed,
    history,
    processed_message_ids: parsed.processed_message_ids.filter((id): id is string => typeof id === 'string'),
  };
}

export class DatabaseService implements CandidateRepository {
  async getCandidate(phone: string): Promise<Candidate | null> {
    const result = await query('SELECT * FROM candidates WHERE phone_number = $1', [phone]);
    return result.rows[0] ? toCandidate(result.rows[0]) : null;
  }

  async findOrCreateCandidate(phone: string): Promise<Candidate> {
    // The no-op update makes RETURNING yield the existing row on conflict.
    const result = await query(
      `INSERT INTO candidates (id, phone_number, status)
       VALUES ($1, $2, 'sent')
       ON CONFLICT (phone_number) DO UPDATE SET phone_number = EXCLUDED.phone_number
       RETURNING *, (xmax = 0) AS inserted`,
      [uuidv4(), phone]
    );

    const row = result.rows[0];
    if (row?.inserted === true) {
      logger.info('Candidate created on first contact', { phone });
    }
    return toCandidate(row);
  }

  async createCandidate(data: NewCandidate): Promise<Candidate | null> {
    const result = await query(
      `INSERT INTO candidates (id, name, surname, phone_number, company_name, job_position, status)
       VALUES ($1, $2, $3, $4, $5, $6, 'sent')
       ON CONFLICT (phone_number) DO NOTHING
       RETURNING *`,
      [uuidv4(), data.name, data.surname, data.phone_number, data.company_name ?? null, data.job_position ?? null]
    );
    return result.rows[0] ? toCandidate(result.rows[0]) : null;
  }

  async recordProcessedMessage(phone: string, messageId: string, limit: number): Promise<boolean> {
    const result = await query(
      `UPDATE candidates
       SET processed_message_ids = (
             SELECT COALESCE(jsonb_agg(elem ORDER BY ord), '[]'::jsonb)
             FROM (
               SELECT elem, ord
               FROM jsonb_array_elements(processed_message_ids || to_jsonb($2::text))
                    WITH ORDINALITY AS t(elem, ord)
               ORDER BY ord DESC
               LIMIT $3
             ) recent
           ),
           last_updated = NOW()
       WHERE phone_number = $1 AND NOT (processed_message_ids ? $2)
       RETURNING id`,
      [phone, messageId, limit]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async appendHistory(phone: string, entries: HistoryEntry[]): Promise<Candidate> {
    const result = await query(
      `UPDATE candidates
       SET history = history || $2::jsonb, last_updated = NOW()
       WHERE phone_number = $1
       RETURNING *`,
      [phone, JSON.stringify(entries)]
    );
    return this.requireRow(result.rows[0], phone);
  }

  async recordBotReply(phone: string, text: string): Promise<Candidate | null> {
    const entry: HistoryEntry = { from: 'bot', text };
    const result = await query(
      `UPDATE candidates
       SET history = history || $2::jsonb, status = 'replied', last_updated = NOW()
       WHERE phone_number = $1 AND status <> 'escalated'
       RETURNING *`,
      [phone, JSON.stringify([entry])]
    );
    return result.rows[0] ? toCandidate(result.rows[0]) : null;
  }

  async escalateCandidate(phone: string, reason: string): Promise<Candidate | null> {
    const result = await query(
      `UPDATE candidates
       SET status = 'escalated', escalation_reason = $2, last_updated = NOW()
       WHERE phone_number = $1 AND status <> 'escalated'
       RETURNING *`,
      [phone, reason]
    );
    return result.rows[0] ? toCandidate(result.rows[0]) : null;
  }

  async resumeCandidate(phone: string, keepLast: number): Promise<Candidate | null> {
    const result = await query(
      `UPDATE candidates
       SET status = 'replied',
           escalation_reason = NULL,
           history = (
             SELECT COALESCE(jsonb_agg(elem ORDER BY ord), '[]'::jsonb)
             FROM (
               SELECT elem, ord
               FROM jsonb_array_elements(history) WITH ORDINALITY AS t(elem, ord)
               ORDER BY ord DESC
               LIMIT $2
             ) kept
           ),
           last_updated = NOW()
       WHERE phone_number = $1 AND status = 'escalated'
       RETURNING *`,
      [phone, keepLast]
    );
    return result.rows[0] ? toCandidate(result.rows[0]) : null;
  }

  async listCandidates(): Promise<Candidate[]> {
    const result = await query('SELECT * FROM candidates ORDER BY last_updated DESC');
    return result.rows.map(toCandidate);
  }

  async listCandidatesByStatus(status: CandidateStatus): Promise<Candidate[]> {
    const result = await query('SELECT * FROM candidates WHERE status = $1 ORDER BY last_updated DESC', [status]);
    return result.rows.map(toCandidate);
  }

  private requireRow(row: unknown, phone: string): Candidate {
    if (!row) {
      throw new Error(`Candidate not found: ${phone}`);
    }
    return toCandidate(row);
  }
}
