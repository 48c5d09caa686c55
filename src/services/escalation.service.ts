import { z } from 'zod';
import { ConversationTurn, HistoryEntry, isConversationTurn } from '../types/candidate';
import { LLMProvider } from '../types/llm';
import {
  ESCALATION_THRESHOLDS,
  IMMEDIATE_ESCALATION_PHRASES,
  SCORED_CHECK_EVERY,
  SCORED_CHECK_WINDOW,
} from '../config/escalation';
import { Language } from '../utils/language';
import { buildEscalationPrompt, formatTranscript } from '../utils/prompts';
import { stripCodeFences } from '../utils/model-output';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

const CLASSIFIER_TIMEOUT_MS = 5000;

const score = z.coerce.number().min(0).max(10).default(0);

const scoresSchema = z.object({
  frustration_score: score,
  human_request_score: score,
  confusion_score: score,
  repeat_count: score,
});

export type EscalationScores = z.infer<typeof scoresSchema>;

export interface EscalationResult {
  shouldEscalate: boolean;
  reason: string | null;
  scores: EscalationScores | null;
}

export interface EscalationServiceOptions {
  classifierModel: string;
  phrases?: Record<Language, string[]>;
}

const NO_ESCALATION: EscalationResult = { shouldEscalate: false, reason: null, scores: null };

export class EscalationService {
  private classifierModel: string;
  private phrases: string[];

  constructor(private llm: LLMProvider, options: EscalationServiceOptions) {
    this.classifierModel = options.classifierModel;
    const phrases = options.phrases ?? IMMEDIATE_ESCALATION_PHRASES;
    this.phrases = [...phrases.it, ...phrases.en].map((phrase) => phrase.toLowerCase());
  }

  /** Tier 1: returns the matched phrase, whatever language it belongs to. */
  checkImmediate(message: string): string | null {
    const text = message.toLowerCase();
    return this.phrases.find((phrase) => text.includes(phrase)) ?? null;
  }

  /** Samples tier 2 on the first user message and every third one after. */
  shouldRunScoredCheck(userMessageCount: number): boolean {
    return userMessageCount === 1 || (userMessageCount > 0 && userMessageCount % SCORED_CHECK_EVERY === 0);
  }

  buildWindow(history: HistoryEntry[]): ConversationTurn[] {
    return history.filter(isConversationTurn).slice(-SCORED_CHECK_WINDOW);
  }

  evaluateScores(scores: EscalationScores): EscalationResult {
    const f = scores.frustration_score;
    const h = scores.human_request_score;
    const c = scores.confusion_score;
    const r = scores.repeat_count;

    const shouldEscalate =
      f >= ESCALATION_THRESHOLDS.frustration ||
      h >= ESCALATION_THRESHOLDS.humanRequest ||
      (c >= ESCALATION_THRESHOLDS.confusion && r >= ESCALATION_THRESHOLDS.repeatCount);

    return {
      shouldEscalate,
      reason: shouldEscalate ? `Escalated (F:${f}, H:${h}, C:${c}, R:${r})` : null,
      scores,
    };
  }

  async scoreConversation(window: ConversationTurn[], message: string): Promise<EscalationScores> {
    const transcript = formatTranscript([...window, { from: 'user', text: message }]);

    const completion = await this.llm.complete({
      model: this.classifierModel,
      messages: [{ role: 'user', content: buildEscalationPrompt(transcript) }],
      timeoutMs: CLASSIFIER_TIMEOUT_MS,
      temperature: 0,
      jsonMode: true,
    });

    return scoresSchema.parse(JSON.parse(stripCodeFences(completion.content)));
  }

  /** Tier 2. Any failure means no escalation. */
  async runScoredCheck(window: ConversationTurn[], message: string): Promise<EscalationResult> {
    try {
      const scores = await this.scoreConversation(window, message);
      const result = this.evaluateScores(scores);
      logger.debug('Escalation scores', { ...scores, escalate: result.shouldEscalate });
      return result;
    } catch (error) {
      logger.warn('Scored escalation check failed', { error: toError(error).message });
      return NO_ESCALATION;
    }
  }
}
