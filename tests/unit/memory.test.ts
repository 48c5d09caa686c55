import { MemoryService, getStateObjects } from '../../src/services/memory.service';
import { HistoryEntry } from '../../src/types/candidate';
import { InMemoryCandidateRepository, completion, createFakeLLM, turns } from '../helpers/fakes';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const PHONE = '393331234567';

describe('getStateObjects', () => {
  it('returns nulls for an empty history', () => {
    expect(getStateObjects([])).toEqual({ state: null, summary: null });
  });

  it('returns the latest state and summary', () => {
    const history: HistoryEntry[] = [
      { from: 'state', text: '{"step":"registration"}' },
      { from: 'summary', text: 'old summary' },
      { from: 'user', text: 'ciao' },
      { from: 'state', text: '{"step":"documents"}' },
      { from: 'summary', text: 'new summary' },
    ];

    expect(getStateObjects(history)).toEqual({ state: { step: 'documents' }, summary: 'new summary' });
  });

  it('does not fall back to an older state when the latest is malformed', () => {
    const history: HistoryEntry[] = [
      { from: 'state', text: '{"step":"registration"}' },
      { from: 'state', text: '{broken' },
    ];

    expect(getStateObjects(history).state).toBeNull();
  });

  it('rejects a state that is not an object', () => {
    expect(getStateObjects([{ from: 'state', text: '[1,2]' }]).state).toBeNull();
    expect(getStateObjects([{ from: 'state', text: '"text"' }]).state).toBeNull();
  });
});

describe('MemoryService.summarizeIfNeeded', () => {
  let db: InMemoryCandidateRepository;
  let fake: ReturnType<typeof createFakeLLM>;
  let memory: MemoryService;

  beforeEach(() => {
    db = new InMemoryCandidateRepository();
    fake = createFakeLLM();
    memory = new MemoryService(db, fake.llm, { classifierModel: 'classifier-test' });
  });

  it('does nothing for an unknown candidate', async () => {
    expect(await memory.summarizeIfNeeded(PHONE)).toBe(false);
    expect(fake.complete).not.toHaveBeenCalled();
  });

  it('never summarizes below 60 entries', async () => {
    db.seed({ phone_number: PHONE, history: turns(59) });

    expect(await memory.summarizeIfNeeded(PHONE)).toBe(false);
    expect(fake.complete).not.toHaveBeenCalled();
  });

  it('summarizes the last 40 conversational entries at 60', async () => {
    db.seed({ phone_number: PHONE, history: turns(60) });
    fake.complete.mockResolvedValueOnce(completion('- user is registering'));

    expect(await memory.summarizeIfNeeded(PHONE)).toBe(true);

    const request = fake.complete.mock.calls[0][0];
    expect(request.model).toBe('classifier-test');
    expect(request.timeoutMs).toBe(12000);
    const prompt = request.messages[1].content;
    expect(prompt).toContain('--- WINDOW ---\nuser: msg 20\n');
    expect(prompt).toContain('bot: msg 59\n--- END ---');
    expect(prompt).not.toContain('msg 19\n');

    const stored = db.peek(PHONE);
    expect(stored?.history).toHaveLength(61);
    expect(stored?.history[60]).toEqual({ from: 'summary', text: '- user is registering' });
  });

  it('starts the next window after the previous summary', async () => {
    const history: HistoryEntry[] = [
      ...turns(55, 'old'),
      { from: 'summary', text: 'earlier summary' },
      ...turns(6, 'new'),
    ];
    db.seed({ phone_number: PHONE, history });
    fake.complete.mockResolvedValueOnce(completion('- continued'));

    await memory.summarizeIfNeeded(PHONE);

    const prompt = fake.complete.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain('--- WINDOW ---\nuser: new 0\nbot: new 1\nuser: new 2\nbot: new 3\nuser: new 4\nbot: new 5\n--- END ---');
  });

  it('asks for the summary in the language of the window', async () => {
    const history: HistoryEntry[] = Array.from({ length: 60 }, (): HistoryEntry => ({
      from: 'user',
      text: 'ciao, grazie per il documento',
    }));
    db.seed({ phone_number: PHONE, history });
    fake.complete.mockResolvedValueOnce(completion('- riepilogo'));

    await memory.summarizeIfNeeded(PHONE);

    expect(fake.complete.mock.calls[0][0].messages[1].content).toContain('Keep Italian.');
  });

  it('logs and skips when the model fails', async () => {
    db.seed({ phone_number: PHONE, history: turns(60) });
    fake.complete.mockRejectedValueOnce(new Error('upstream down'));

    expect(await memory.summarizeIfNeeded(PHONE)).toBe(false);
    expect(db.peek(PHONE)?.history).toHaveLength(60);
  });

  it('does not store an empty summary', async () => {
    db.seed({ phone_number: PHONE, history: turns(60) });
    fake.complete.mockResolvedValueOnce(completion('   '));

    expect(await memory.summarizeIfNeeded(PHONE)).toBe(false);
    expect(db.peek(PHONE)?.history).toHaveLength(60);
  });
});
