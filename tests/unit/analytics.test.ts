import { AnalyticsService, computeReportStats } from '../../src/services/analytics.service';
import { HistoryEntry } from '../../src/types/candidate';
import { InMemoryCandidateRepository, turns } from '../helpers/fakes';

describe('computeReportStats', () => {
  it('returns zeros for an empty table', () => {
    expect(computeReportStats([])).toEqual({
      summary: {
        total_users: 0,
        total_messages: 0,
        average_conversation_length: 0,
        bot_messages: 0,
        user_messages: 0,
        admin_messages: 0,
      },
      engagement_funnel: { sent: 0, replied: 0, completed_onboarding: 0, escalated: 0 },
      escalation_stats: { total_escalated: 0, with_reason: 0 },
    });
  });
});

describe('AnalyticsService', () => {
  it('aggregates message counts and the engagement funnel', async () => {
    const db = new InMemoryCandidateRepository();
    const memory: HistoryEntry[] = [
      { from: 'state', text: '{}' },
      { from: 'summary', text: '- step 1' },
    ];

    db.seed({ phone_number: '391', status: 'sent' });
    db.seed({ phone_number: '392', status: 'replied', history: [...turns(12), ...memory] });
    db.seed({
      phone_number: '393',
      status: 'escalated',
      escalation_reason: 'Escalated (F:9, H:2, C:1, R:0)',
      history: [...turns(3), { from: 'admin', text: 'Ciao, sono Paola' }],
    });

    const report = await new AnalyticsService(db).getReport();

    expect(report).toEqual({
      summary: {
        total_users: 3,
        total_messages: 18,
        average_conversation_length: 6,
        bot_messages: 7,
        user_messages: 8,
        admin_messages: 1,
      },
      engagement_funnel: { sent: 1, replied: 1, completed_onboarding: 1, escalated: 1 },
      escalation_stats: { total_escalated: 1, with_reason: 1 },
    });
  });

  it('rounds the average conversation length to two decimals', async () => {
    const db = new InMemoryCandidateRepository();
    db.seed({ phone_number: '391', history: turns(1) });
    db.seed({ phone_number: '392', history: turns(1) });
    db.seed({ phone_number: '393', history: turns(0) });

    const report = await new AnalyticsService(db).getReport();

    expect(report.summary.average_conversation_length).toBe(0.67);
  });
});
