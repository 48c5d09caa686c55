jest.mock('../../src/config/database', () => ({
  query: jest.fn(),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { QueryResult, QueryResultRow } from 'pg';
import { query } from '../../src/config/database';
import { DatabaseService, toCandidate } from '../../src/services/database.service';

const mockQuery = jest.mocked(query);

function result(rows: QueryResultRow[], rowCount = rows.length): QueryResult<QueryResultRow> {
  return { rows, rowCount, command: 'UPDATE', oid: 0, fields: [] };
}

const ROW = {
  id: '5b7d2f0e-0000-4000-8000-000000000001',
  name: 'Giulia',
  surname: 'Rossi',
  phone_number: '393331234567',
  company_name: 'Acme Srl',
  job_position: null,
  status: 'replied',
  escalation_reason: null,
  history: [
    { from: 'user', text: 'Ciao' },
    { from: 'robot', text: 'unexpected' },
    { from: 'bot', text: 'Benvenuta!' },
  ],
  processed_message_ids: ['wamid.1', 42],
  created_at: new Date('2024-05-01T09:00:00.000Z'),
  last_updated: '2024-05-01T09:05:00.000Z',
};

describe('toCandidate', () => {
  it('keeps well-formed history entries and string message ids', () => {
    expect(toCandidate(ROW)).toEqual({
      ...ROW,
      history: [
        { from: 'user', text: 'Ciao' },
        { from: 'bot', text: 'Benvenuta!' },
      ],
      processed_message_ids: ['wamid.1'],
      created_at: '2024-05-01T09:00:00.000Z',
    });
  });

  it('rejects rows with an unknown status', () => {
    expect(() => toCandidate({ ...ROW, status: 'archived' })).toThrow();
  });
});

describe('DatabaseService', () => {
  const db = new DatabaseService();

  beforeEach(() => {
    mockQuery.mockReset();
  });

  it('returns null for an unknown phone', async () => {
    mockQuery.mockResolvedValueOnce(result([]));

    await expect(db.getCandidate('393400000000')).resolves.toBeNull();
    expect(mockQuery).toHaveBeenCalledWith('SELECT * FROM candidates WHERE phone_number = $1', ['393400000000']);
  });

  it('reports a duplicate message id when no row was updated', async () => {
    mockQuery.mockResolvedValueOnce(result([], 0)).mockResolvedValueOnce(result([{ id: ROW.id }]));

    await expect(db.recordProcessedMessage('393331234567', 'wamid.1', 100)).resolves.toBe(false);
    await expect(db.recordProcessedMessage('393331234567', 'wamid.2', 100)).resolves.toBe(true);
    expect(mockQuery.mock.calls[1][1]).toEqual(['393331234567', 'wamid.2', 100]);
  });

  it('appends history entries as one JSON array', async () => {
    mockQuery.mockResolvedValueOnce(result([ROW]));

    await db.appendHistory('393331234567', [{ from: 'summary', text: '- step 2' }]);

    expect(mockQuery.mock.calls[0][1]).toEqual(['393331234567', '[{"from":"summary","text":"- step 2"}]']);
  });

  it('returns null when the candidate was already escalated', async () => {
    mockQuery.mockResolvedValueOnce(result([]));

    await expect(db.escalateCandidate('393331234567', 'Escalated (F:8, H:0, C:0, R:0)')).resolves.toBeNull();
  });

  it('fails when appending to a missing candidate', async () => {
    mockQuery.mockResolvedValueOnce(result([]));

    await expect(db.appendHistory('393400000000', [{ from: 'admin', text: 'Ciao' }])).rejects.toThrow(
      'Candidate not found: 393400000000'
    );
  });

  it('stores no bot reply once the candidate is escalated', async () => {
    mockQuery.mockResolvedValueOnce(result([], 0));

    await expect(db.recordBotReply('393331234567', 'Ciao')).resolves.toBeNull();
    expect(mockQuery.mock.calls[0][0]).toContain("WHERE phone_number = $1 AND status <> 'escalated'");
  });

  it('creates imported candidates with nullable details', async () => {
    mockQuery.mockResolvedValueOnce(result([{ ...ROW, history: [], processed_message_ids: [] }]));

    const created = await db.createCandidate({ name: 'Giulia', surname: 'Rossi', phone_number: '393331234567' });

    expect(created?.phone_number).toBe('393331234567');
    const params = mockQuery.mock.calls[0][1] ?? [];
    expect(params.slice(1)).toEqual(['Giulia', 'Rossi', '393331234567', null, null]);
  });
});
