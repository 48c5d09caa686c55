import { CandidateRepository, HistoryEntry, isConversationTurn } from '../types/candidate';
import { LLMProvider } from '../types/llm';
import { detectLanguage } from '../utils/language';
import { isPlainObject, tryParseJson } from '../utils/model-output';
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt, formatTranscript } from '../utils/prompts';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const SUMMARY_MIN_HISTORY = 60;
export const SUMMARY_WINDOW = 40;
const SUMMARY_TIMEOUT_MS = 12000;

export interface StateObjects {
  state: Record<string, unknown> | null;
  summary: string | null;
}

function lastIndexOf(history: HistoryEntry[], from: HistoryEntry['from']): number {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].from === from) return i;
  }
  return -1;
}

/**
 * Latest state snapshot and latest summary. Only the latest snapshot counts:
 * if it is malformed, state is null even when an older one parses.
 */
export function getStateObjects(history: HistoryEntry[]): StateObjects {
  const stateIndex = lastIndexOf(history, 'state');
  const summaryIndex = lastIndexOf(history, 'summary');

  let state: Record<string, unknown> | null = null;
  if (stateIndex >= 0) {
    const parsed = tryParseJson(history[stateIndex].text);
    state = isPlainObject(parsed) ? parsed : null;
  }

  return {
    state,
    summary: summaryIndex >= 0 ? history[summaryIndex].text : null,
  };
}

export interface MemoryServiceOptions {
  classifierModel: string;
}

export class MemoryService {
  private classifierModel: string;

  constructor(
    private db: CandidateRepository,
    private llm: LLMProvider,
    options: MemoryServiceOptions
  ) {
    this.classifierModel = options.classifierModel;
  }

  /** Rolls older turns into a summary entry once history is long. True when one was written. */
  async summarizeIfNeeded(phone: string): Promise<boolean> {
    try {
      const candidate = await this.db.getCandidate(phone);
      if (!candidate || candidate.history.length < SUMMARY_MIN_HISTORY) {
        return false;
      }

      const start = lastIndexOf(candidate.history, 'summary') + 1;
      const window = candidate.history.slice(start).filter(isConversationTurn).slice(-SUMMARY_WINDOW);
      if (window.length === 0) {
        return false;
      }

      const transcript = formatTranscript(window);
      const lang = detectLanguage(transcript);

      const completion = await this.llm.complete({
        model: this.classifierModel,
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(transcript, lang) },
        ],
        timeoutMs: SUMMARY_TIMEOUT_MS,
        temperature: 0.3,
      });

      const summary = completion.content.trim();
      if (!summary) {
        return false;
      }

      await this.db.appendHistory(phone, [{ from: 'summary', text: summary }]);
      logger.info('Conversation summarized', { phone, turns: window.length, lang });
      return true;
    } catch (error) {
      logger.warn('Summarization failed', { phone, error: toError(error).message });
      return false;
    }
  }
}
