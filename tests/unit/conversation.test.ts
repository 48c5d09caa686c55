import { ConversationService } from '../../src/services/conversation.service';
import { DedupService } from '../../src/services/dedup.service';
import { EscalationService } from '../../src/services/escalation.service';
import { DialogueService } from '../../src/services/dialogue.service';
import { HandoffService } from '../../src/services/handoff.service';
import { EscalationPolicy, IncomingMessage } from '../../src/types/agent';
import {
  InMemoryCandidateRepository,
  MemoryDedupStore,
  completion,
  createFakeJobs,
  createFakeLLM,
  createFakeWhatsApp,
} from '../helpers/fakes';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const PHONE = '393331234567';

function inbound(text: string, messageId: string | null = null): IncomingMessage {
  return { phone: PHONE, text, message_id: messageId, channel: 'meta' };
}

describe('ConversationService', () => {
  let db: InMemoryCandidateRepository;
  let main: ReturnType<typeof createFakeLLM>;
  let classifier: ReturnType<typeof createFakeLLM>;
  let wa: ReturnType<typeof createFakeWhatsApp>;
  let jobs: ReturnType<typeof createFakeJobs>;
  let dedupStore: MemoryDedupStore;

  function build(policy: EscalationPolicy = 'after_reply'): ConversationService {
    const escalation = new EscalationService(classifier.llm, { classifierModel: 'classifier-test' });
    const dialogue = new DialogueService(db, main.llm, {
      mainModel: 'main-test',
      knowledgeBase: 'kb',
      recentTranscriptTurns: 6,
    });
    const handoff = new HandoffService(db, wa.adapter, jobs.jobs);
    return new ConversationService(
      {
        db,
        dedup: new DedupService(dedupStore),
        escalation,
        dialogue,
        handoff,
        whatsapp: wa.adapter,
        jobs: jobs.jobs,
      },
      policy
    );
  }

  beforeEach(() => {
    db = new InMemoryCandidateRepository();
    main = createFakeLLM();
    classifier = createFakeLLM();
    wa = createFakeWhatsApp();
    jobs = createFakeJobs();
    dedupStore = new MemoryDedupStore();
    main.complete.mockResolvedValue(completion('{"reply":"Happy to help with your onboarding."}'));
  });

  it('creates the candidate, replies and queues the tail jobs on first contact', async () => {
    const service = build();

    const result = await service.handleMessage(inbound('Hello', 'wamid.1'));

    expect(result).toEqual({
      success: true,
      phone: PHONE,
      action_taken: 'responded',
      response: 'Happy to help with your onboarding.',
      language: 'en',
    });
    const stored = db.peek(PHONE);
    expect(stored?.status).toBe('replied');
    expect(stored?.history).toEqual([
      { from: 'user', text: 'Hello' },
      { from: 'bot', text: 'Happy to help with your onboarding.' },
    ]);
    expect(stored?.processed_message_ids).toEqual(['wamid.1']);
    expect(wa.sendText).toHaveBeenCalledWith(PHONE, 'Happy to help with your onboarding.');
    expect(jobs.scheduleEscalationCheck).toHaveBeenCalledWith({ phone: PHONE, message: 'Hello', window: [] });
    expect(jobs.scheduleSummary).toHaveBeenCalledWith({ phone: PHONE });
  });

  describe('deduplication', () => {
    it('processes the same message id once', async () => {
      const service = build();

      await service.handleMessage(inbound('Hello', 'wamid.1'));
      const second = await service.handleMessage(inbound('Hello', 'wamid.1'));

      expect(second.action_taken).toBe('duplicate');
      expect(second.response).toBeNull();
      expect(db.peek(PHONE)?.history.filter((e) => e.from === 'user')).toHaveLength(1);
      expect(wa.sendText).toHaveBeenCalledTimes(1);
      expect(main.complete).toHaveBeenCalledTimes(1);
    });

    it('falls back to the stored ids when the cache is unavailable', async () => {
      jest.spyOn(dedupStore, 'set').mockRejectedValue(new Error('redis down'));
      db.seed({ phone_number: PHONE, processed_message_ids: ['wamid.7'], history: [{ from: 'user', text: 'Hi' }] });
      const service = build();

      const result = await service.handleMessage(inbound('Hi', 'wamid.7'));

      expect(result.action_taken).toBe('duplicate');
      expect(db.peek(PHONE)?.history).toHaveLength(1);
      expect(main.complete).not.toHaveBeenCalled();
    });

    it('keeps only the last 100 processed ids', async () => {
      const ids = Array.from({ length: 100 }, (_, i) => `old-${i}`);
      db.seed({ phone_number: PHONE, processed_message_ids: ids });
      const service = build();

      await service.handleMessage(inbound('Hello', 'new-1'));

      const stored = db.peek(PHONE)?.processed_message_ids ?? [];
      expect(stored).toHaveLength(100);
      expect(stored[0]).toBe('old-1');
      expect(stored[99]).toBe('new-1');
    });
  });

  describe('immediate escalation', () => {
    it('escalates an English human request without calling any model', async () => {
      const service = build();

      const result = await service.handleMessage(inbound('I want to speak to a human', 'wamid.2'));

      expect(result.action_taken).toBe('escalated');
      expect(result.response).toBe("I'll connect you with an operator. You'll receive assistance shortly.");
      expect(main.complete).not.toHaveBeenCalled();
      expect(classifier.complete).not.toHaveBeenCalled();
      expect(wa.sendText).toHaveBeenCalledWith(PHONE, "I'll connect you with an operator. You'll receive assistance shortly.");

      const stored = db.peek(PHONE);
      expect(stored?.status).toBe('escalated');
      expect(stored?.escalation_reason).toBe('Immediate escalation (explicit request)');
      expect(jobs.notify).toHaveBeenCalledWith({
        type: 'escalation',
        phone: PHONE,
        name: 'Unknown',
        reason: 'Immediate escalation (explicit request)',
      });
    });

    it('answers an Italian request with the Italian handoff text', async () => {
      const service = build();

      const result = await service.handleMessage(inbound('Ciao, posso parlare con un operatore?'));

      expect(result.language).toBe('it');
      expect(wa.sendText).toHaveBeenCalledWith(PHONE, 'Ti metto in contatto con un operatore. A breve riceverai assistenza.');
      expect(main.complete).not.toHaveBeenCalled();
    });

    it('does not notify twice for an already escalated candidate', async () => {
      db.seed({ phone_number: PHONE, status: 'escalated', escalation_reason: 'earlier' });
      const service = build();

      await service.handleMessage(inbound('speak to a human'));

      expect(jobs.notify).not.toHaveBeenCalled();
      expect(db.peek(PHONE)?.escalation_reason).toBe('earlier');
    });
  });

  it('stays silent while a candidate is escalated', async () => {
    db.seed({ phone_number: PHONE, status: 'escalated', escalation_reason: 'operator' });
    const service = build();

    const result = await service.handleMessage(inbound('ok, thanks'));

    expect(result.action_taken).toBe('paused');
    expect(db.peek(PHONE)?.history).toEqual([{ from: 'user', text: 'ok, thanks' }]);
    expect(main.complete).not.toHaveBeenCalled();
    expect(wa.sendText).not.toHaveBeenCalled();
    expect(jobs.scheduleSummary).not.toHaveBeenCalled();
  });

  describe('after_reply policy', () => {
    it('queues the scored check with the turns captured before the reply', async () => {
      db.seed({
        phone_number: PHONE,
        status: 'replied',
        history: [
          { from: 'user', text: 'u1' },
          { from: 'bot', text: 'b1' },
          { from: 'state', text: '{}' },
          { from: 'user', text: 'u2' },
          { from: 'bot', text: 'b2' },
        ],
      });
      const service = build('after_reply');

      await service.handleMessage(inbound('u3'));

      expect(classifier.complete).not.toHaveBeenCalled();
      expect(jobs.scheduleEscalationCheck).toHaveBeenCalledWith({
        phone: PHONE,
        message: 'u3',
        window: [
          { from: 'user', text: 'u1' },
          { from: 'bot', text: 'b1' },
          { from: 'user', text: 'u2' },
          { from: 'bot', text: 'b2' },
        ],
      });
    });

    it('skips the scored check on unsampled messages', async () => {
      db.seed({ phone_number: PHONE, status: 'replied', history: [{ from: 'user', text: 'u1' }, { from: 'bot', text: 'b1' }] });
      const service = build('after_reply');

      await service.handleMessage(inbound('u2'));

      expect(jobs.scheduleEscalationCheck).not.toHaveBeenCalled();
      expect(jobs.scheduleSummary).toHaveBeenCalledWith({ phone: PHONE });
    });
  });

  describe('before_reply policy', () => {
    it('escalates without replying when the scores fire', async () => {
      classifier.complete.mockResolvedValueOnce(completion('{"frustration_score": 9, "human_request_score": 0}'));
      const service = build('before_reply');

      const result = await service.handleMessage(inbound('this is not working at all'));

      expect(result.action_taken).toBe('escalated');
      expect(result.response).toBeNull();
      expect(main.complete).not.toHaveBeenCalled();
      expect(wa.sendText).not.toHaveBeenCalled();
      expect(db.peek(PHONE)?.escalation_reason).toBe('Escalated (F:9, H:0, C:0, R:0)');
      expect(jobs.notify).toHaveBeenCalledTimes(1);
    });

    it('replies normally when the scores stay low and queues no background check', async () => {
      classifier.complete.mockResolvedValueOnce(completion('{"frustration_score": 1}'));
      const service = build('before_reply');

      const result = await service.handleMessage(inbound('Hello'));

      expect(result.action_taken).toBe('responded');
      expect(classifier.complete).toHaveBeenCalledTimes(1);
      expect(jobs.scheduleEscalationCheck).not.toHaveBeenCalled();
      expect(db.peek(PHONE)?.status).toBe('replied');
    });

    it('replies when the classifier fails', async () => {
      classifier.complete.mockRejectedValueOnce(new Error('timeout'));
      const service = build('before_reply');

      const result = await service.handleMessage(inbound('Hello'));

      expect(result.action_taken).toBe('responded');
    });
  });

  it('neither stores nor sends a reply when the candidate was escalated meanwhile', async () => {
    main.complete.mockImplementationOnce(async () => {
      await db.escalateCandidate(PHONE, 'operator took over');
      return completion('{"reply":"Too late"}');
    });
    const service = build();

    const result = await service.handleMessage(inbound('Hello'));

    expect(result.action_taken).toBe('suppressed');
    expect(result.response).toBeNull();
    expect(wa.sendText).not.toHaveBeenCalled();
    const stored = db.peek(PHONE);
    expect(stored?.status).toBe('escalated');
    expect(stored?.history).toEqual([{ from: 'user', text: 'Hello' }]);
    expect(jobs.scheduleSummary).not.toHaveBeenCalled();
  });

  it('keeps the stored reply when delivery fails', async () => {
    wa.sendText.mockRejectedValueOnce(new Error('provider down'));
    const service = build();

    const result = await service.handleMessage(inbound('Hello'));

    expect(result.action_taken).toBe('responded');
    expect(db.peek(PHONE)?.history[1]).toEqual({ from: 'bot', text: 'Happy to help with your onboarding.' });
  });

  it('sends the apology when the model fails', async () => {
    main.complete.mockReset();
    main.complete.mockRejectedValue(new Error('timeout'));
    const service = build();

    const result = await service.handleMessage(inbound('Ciao, grazie'));

    expect(result.response).toBe('Spiacente, si è verificato un errore. Riprova più tardi.');
    expect(wa.sendText).toHaveBeenCalledWith(PHONE, 'Spiacente, si è verificato un errore. Riprova più tardi.');
  });
});
