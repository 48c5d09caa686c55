import { Candidate, CandidateRepository, isConversationTurn } from '../types/candidate';
import { OrchestratorOutput } from '../types/agent';
import { DialogueMessage, LLMProvider } from '../types/llm';
import { Language } from '../utils/language';
import { parseModelOutput } from '../utils/model-output';
import {
  FIXED_REPLIES,
  buildOutputContractPrompt,
  buildPersonaPrompt,
  formatTranscript,
} from '../utils/prompts';
import { getStateObjects } from './memory.service';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

const REPLY_TIMEOUT_MS = 8000;

export interface DialogueServiceOptions {
  mainModel: string;
  knowledgeBase: string;
  recentTranscriptTurns: number;
}

export class DialogueService {
  private mainModel: string;
  private knowledgeBase: string;
  private recentTranscriptTurns: number;

  constructor(
    private db: CandidateRepository,
    private llm: LLMProvider,
    options: DialogueServiceOptions
  ) {
    this.mainModel = options.mainModel;
    this.knowledgeBase = options.knowledgeBase;
    this.recentTranscriptTurns = options.recentTranscriptTurns;
  }

  /**
   * Assembles the prompt for one reply. Expects the current user message to
   * already be in the candidate's history.
   */
  buildDialogueMessages(candidate: Candidate, userMessage: string, lang: Language, isFirstInbound: boolean): DialogueMessage[] {
    const { state, summary } = getStateObjects(candidate.history);
    const recent = candidate.history.filter(isConversationTurn).slice(-this.recentTranscriptTurns);

    const messages: DialogueMessage[] = [
      { role: 'system', content: buildPersonaPrompt(lang, this.knowledgeBase) },
      { role: 'system', content: buildOutputContractPrompt(lang) },
    ];

    if (summary) {
      messages.push({ role: 'system', content: `Conversation summary so far:\n${summary}` });
    }
    if (state) {
      messages.push({ role: 'system', content: `State memory:\n${JSON.stringify(state)}` });
    }
    if (recent.length > 0) {
      messages.push({ role: 'system', content: `Recent transcript:\n${formatTranscript(recent)}` });
    }

    messages.push({ role: 'system', content: `FIRST_CONTACT: ${isFirstInbound ? 'true' : 'false'}` });
    messages.push({ role: 'user', content: userMessage });
    return messages;
  }

  /** One model call, one reply. Never throws; failures become the fixed apology. */
  async generateReply(candidate: Candidate, userMessage: string, lang: Language): Promise<OrchestratorOutput> {
    const userTurns = candidate.history.filter((entry) => entry.from === 'user').length;
    const messages = this.buildDialogueMessages(candidate, userMessage, lang, userTurns === 1);

    let output: OrchestratorOutput;
    try {
      const completion = await this.llm.complete({
        model: this.mainModel,
        messages,
        timeoutMs: REPLY_TIMEOUT_MS,
        temperature: 0.7,
        topP: 1,
        frequencyPenalty: 0.7,
        presencePenalty: 0.3,
        jsonMode: true,
      });
      output = parseModelOutput(completion.content, lang);
    } catch (error) {
      logger.error('Reply generation failed', { phone: candidate.phone_number, error: toError(error).message });
      return {
        reply: FIXED_REPLIES.apology[lang],
        intent: 'other',
        next_step: '',
        state_update: null,
        sanitized: true,
      };
    }

    if (output.sanitized) {
      logger.warn('Model output sanitized', { phone: candidate.phone_number, intent: output.intent });
    }

    if (output.state_update) {
      try {
        await this.db.appendHistory(candidate.phone_number, [
          { from: 'state', text: JSON.stringify(output.state_update) },
        ]);
      } catch (error) {
        logger.warn('Failed to persist state snapshot', { phone: candidate.phone_number, error: toError(error).message });
      }
    }

    return output;
  }
}
