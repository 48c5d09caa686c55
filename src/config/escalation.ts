import { Language } from '../utils/language';

/**
 * Explicit human-request phrases. Matched as lower-case substrings of the
 * incoming message, whatever its detected language.
 */
export const IMMEDIATE_ESCALATION_PHRASES: Record<Language, string[]> = {
  it: [
    'parlare con un operatore',
    'parlare con una persona',
    'contattare un umano',
    'assistenza umana',
    'voglio un operatore',
    'voglio parlare con',
    'posso parlare con una persona',
    'ho bisogno di parlare con un operatore',
  ],
  en: [
    'speak to a human',
    'talk to an operator',
    'contact a person',
    'human assistance',
    'i need a person',
    'real person',
    'talk to a person',
    'speak with an agent',
  ],
};

export const IMMEDIATE_ESCALATION_REASON = 'Immediate escalation (explicit request)';

/** Scored escalation thresholds: F ≥ 7, H ≥ 8, or C ≥ 8 with R ≥ 3. */
export const ESCALATION_THRESHOLDS = {
  frustration: 7,
  humanRequest: 8,
  confusion: 8,
  repeatCount: 3,
};

/** Scored check runs on the first user message and on every third one. */
export const SCORED_CHECK_EVERY = 3;
export const SCORED_CHECK_WINDOW = 5;
