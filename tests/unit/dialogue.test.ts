import { DialogueService } from '../../src/services/dialogue.service';
import { Candidate, HistoryEntry } from '../../src/types/candidate';
import { InMemoryCandidateRepository, completion, createFakeLLM } from '../helpers/fakes';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const PHONE = '393331234567';
const KNOWLEDGE = 'Documents: ID card and tax code.';

describe('DialogueService', () => {
  let db: InMemoryCandidateRepository;
  let fake: ReturnType<typeof createFakeLLM>;
  let dialogue: DialogueService;

  function seed(history: HistoryEntry[]): Candidate {
    return db.seed({ phone_number: PHONE, history });
  }

  beforeEach(() => {
    db = new InMemoryCandidateRepository();
    fake = createFakeLLM();
    dialogue = new DialogueService(db, fake.llm, {
      mainModel: 'main-test',
      knowledgeBase: KNOWLEDGE,
      recentTranscriptTurns: 6,
    });
  });

  describe('buildDialogueMessages', () => {
    it('emits persona, contract, first-contact flag and user message for a new conversation', () => {
      const candidate = seed([{ from: 'user', text: 'Hello' }]);
      const messages = dialogue.buildDialogueMessages(candidate, 'Hello', 'en', true);

      expect(messages.map((m) => m.role)).toEqual(['system', 'system', 'system', 'system', 'user']);
      expect(messages[0].content).toContain('You are a candidate onboarding assistant');
      expect(messages[0].content).toContain(`Knowledge base:\n${KNOWLEDGE}`);
      expect(messages[1].content).toContain('user-facing answer in English');
      expect(messages[2].content).toBe('Recent transcript:\nuser: Hello');
      expect(messages[3].content).toBe('FIRST_CONTACT: true');
      expect(messages[4]).toEqual({ role: 'user', content: 'Hello' });
    });

    it('adds summary, state and recent transcript in order', () => {
      const candidate = seed([
        { from: 'user', text: 'ciao' },
        { from: 'bot', text: 'Ciao!' },
        { from: 'summary', text: '- wants to register' },
        { from: 'state', text: '{"step":"registration"}' },
        { from: 'user', text: 'come mi registro?' },
      ]);

      const messages = dialogue.buildDialogueMessages(candidate, 'come mi registro?', 'it', false);

      expect(messages[0].content).toContain("Sei un assistente per l'onboarding");
      expect(messages[1].content).toContain('user-facing answer in Italian');
      expect(messages[2].content).toBe('Conversation summary so far:\n- wants to register');
      expect(messages[3].content).toBe('State memory:\n{"step":"registration"}');
      expect(messages[4].content).toBe('Recent transcript:\nuser: ciao\nbot: Ciao!\nuser: come mi registro?');
      expect(messages[5].content).toBe('FIRST_CONTACT: false');
      expect(messages[6]).toEqual({ role: 'user', content: 'come mi registro?' });
    });

    it('limits the transcript to the configured number of turns', () => {
      const history: HistoryEntry[] = Array.from({ length: 10 }, (_, i): HistoryEntry => ({ from: 'user', text: `m${i}` }));
      const messages = dialogue.buildDialogueMessages(seed(history), 'm9', 'en', false);

      expect(messages[2].content).toBe('Recent transcript:\nuser: m4\nuser: m5\nuser: m6\nuser: m7\nuser: m8\nuser: m9');
    });
  });

  describe('generateReply', () => {
    it('calls the main model with the reply parameters', async () => {
      const candidate = seed([{ from: 'user', text: 'Hi' }]);
      fake.complete.mockResolvedValueOnce(completion('{"reply":"Welcome aboard!","intent":"greeting"}'));

      const output = await dialogue.generateReply(candidate, 'Hi', 'en');

      expect(output.reply).toBe('Welcome aboard!');
      expect(output.intent).toBe('greeting');
      expect(fake.complete).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'main-test',
          timeoutMs: 8000,
          temperature: 0.7,
          topP: 1,
          frequencyPenalty: 0.7,
          presencePenalty: 0.3,
          jsonMode: true,
        })
      );
    });

    it('marks the first inbound message as first contact', async () => {
      const candidate = seed([{ from: 'user', text: 'Hi' }]);
      fake.complete.mockResolvedValueOnce(completion('{"reply":"Hey"}'));

      await dialogue.generateReply(candidate, 'Hi', 'en');

      const contents = fake.complete.mock.calls[0][0].messages.map((m) => m.content);
      expect(contents).toContain('FIRST_CONTACT: true');
    });

    it('persists a state update as a state entry', async () => {
      const candidate = seed([{ from: 'user', text: 'Hi' }]);
      fake.complete.mockResolvedValueOnce(
        completion(JSON.stringify({ reply: 'Ok, next the documents.', state_update: { step: 'documents', notes: 'greeted' } }))
      );

      await dialogue.generateReply(candidate, 'Hi', 'en');

      expect(db.peek(PHONE)?.history).toEqual([
        { from: 'user', text: 'Hi' },
        { from: 'state', text: '{"step":"documents","notes":"greeted"}' },
      ]);
    });

    it('persists the state update even when the reply was sanitized', async () => {
      const candidate = seed([{ from: 'user', text: 'Hi' }]);
      fake.complete.mockResolvedValueOnce(completion(JSON.stringify({ reply: '{"oops":1}', state_update: { step: 'x' } })));

      const output = await dialogue.generateReply(candidate, 'Hi', 'en');

      expect(output.reply).toBe('Ok.');
      expect(db.peek(PHONE)?.history[1]).toEqual({ from: 'state', text: '{"step":"x"}' });
    });

    it('returns the apology in the message language when the model fails', async () => {
      const candidate = seed([{ from: 'user', text: 'Ciao' }]);
      fake.complete.mockRejectedValueOnce(new Error('timeout'));

      const output = await dialogue.generateReply(candidate, 'Ciao', 'it');

      expect(output.reply).toBe('Spiacente, si è verificato un errore. Riprova più tardi.');
      expect(db.peek(PHONE)?.history).toHaveLength(1);
    });

    it('keeps the reply when the state snapshot cannot be stored', async () => {
      const candidate = seed([{ from: 'user', text: 'Hi' }]);
      fake.complete.mockResolvedValueOnce(completion(JSON.stringify({ reply: 'Done', state_update: { step: 'y' } })));
      jest.spyOn(db, 'appendHistory').mockRejectedValueOnce(new Error('db down'));

      const output = await dialogue.generateReply(candidate, 'Hi', 'en');
      expect(output.reply).toBe('Done');
    });
  });
});
