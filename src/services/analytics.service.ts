import { Candidate, CandidateRepository } from '../types/candidate';

/** Bot replies needed before a candidate counts as having completed onboarding. */
export const COMPLETED_ONBOARDING_BOT_REPLIES = 6;

export interface ReportStats {
  summary: {
    total_users: number;
    total_messages: number;
    average_conversation_length: number;
    bot_messages: number;
    user_messages: number;
    admin_messages: number;
  };
  engagement_funnel: {
    sent: number;
    replied: number;
    completed_onboarding: number;
    escalated: number;
  };
  escalation_stats: {
    total_escalated: number;
    with_reason: number;
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeReportStats(candidates: Candidate[]): ReportStats {
  let totalMessages = 0;
  let bot = 0;
  let user = 0;
  let admin = 0;
  let completed = 0;

  for (const candidate of candidates) {
    totalMessages += candidate.history.length;
    let botForCandidate = 0;

    for (const entry of candidate.history) {
      if (entry.from === 'bot') botForCandidate++;
      else if (entry.from === 'user') user++;
      else if (entry.from === 'admin') admin++;
    }

    bot += botForCandidate;
    if (botForCandidate >= COMPLETED_ONBOARDING_BOT_REPLIES) completed++;
  }

  const escalated = candidates.filter((c) => c.status === 'escalated');

  return {
    summary: {
      total_users: candidates.length,
      total_messages: totalMessages,
      average_conversation_length: candidates.length > 0 ? round2(totalMessages / candidates.length) : 0,
      bot_messages: bot,
      user_messages: user,
      admin_messages: admin,
    },
    engagement_funnel: {
      sent: candidates.filter((c) => c.status === 'sent').length,
      replied: candidates.filter((c) => c.status === 'replied').length,
      completed_onboarding: completed,
      escalated: escalated.length,
    },
    escalation_stats: {
      total_escalated: escalated.length,
      with_reason: escalated.filter((c) => Boolean(c.escalation_reason)).length,
    },
  };
}

export class AnalyticsService {
  constructor(private db: CandidateRepository) {}

  async getReport(): Promise<ReportStats> {
    return computeReportStats(await this.db.listCandidates());
  }
}
