import { Language } from './language';
import { OrchestratorOutput } from '../types/agent';

export const ACKNOWLEDGEMENT: Record<Language, string> = {
  it: 'Ok.',
  en: 'Ok.',
};

const OPENING_FENCE = /^```[\w-]*[ \t]*\n?/gm;
const CLOSING_FENCE = /\n?```[ \t]*$/gm;
const REPLY_FIELD = /"reply"\s*:\s*"((?:[^"\\]|\\.)*)"/s;

export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.includes('```')) return trimmed;
  return trimmed.replace(OPENING_FENCE, '').replace(CLOSING_FENCE, '').trim();
}

export function looksLikeJsonObject(text: string): boolean {
  return text.startsWith('{') && text.endsWith('}');
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON.parse that returns undefined instead of throwing. */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function recoverReplyField(text: string): string | null {
  const match = REPLY_FIELD.exec(text);
  if (!match) return null;
  return match[1].replace(/\\"/g, '"').replace(/\\n/g, '\n').replace(/\\\\/g, '\\');
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Single-level recovery for a reply that is itself a JSON envelope.
 * Returns null when nothing usable is inside.
 */
function unwrapEchoedEnvelope(reply: string): string | null {
  const inner = tryParseJson(reply);
  if (!isPlainObject(inner) || typeof inner.reply !== 'string') return null;

  const innerReply = inner.reply.trim();
  if (!innerReply || looksLikeJsonObject(innerReply)) return null;
  return innerReply;
}

/**
 * Turns raw model text into a user-facing reply plus optional state update.
 * The reply is never a `{...}` string; unusable output falls back to the
 * fixed acknowledgement.
 */
export function parseModelOutput(raw: string, lang: Language): OrchestratorOutput {
  const cleaned = stripCodeFences(raw);
  const parsed = tryParseJson(cleaned);

  let data: Record<string, unknown>;
  let sanitized = false;
  if (isPlainObject(parsed)) {
    data = parsed;
  } else if (parsed === undefined) {
    data = { reply: looksLikeJsonObject(cleaned) ? recoverReplyField(cleaned) ?? '' : cleaned };
  } else {
    // Valid JSON that is not the contract object: a bare string is unquoted, anything else is dropped.
    sanitized = true;
    data = { reply: typeof parsed === 'string' ? parsed : '' };
  }

  const fallback = ACKNOWLEDGEMENT[lang];
  let reply = asText(data.reply);

  if (looksLikeJsonObject(reply)) {
    sanitized = true;
    reply = unwrapEchoedEnvelope(reply) ?? fallback;
  }

  if (!reply) {
    sanitized = true;
    reply = fallback;
  }

  return {
    reply,
    intent: typeof data.intent === 'string' ? data.intent : 'other',
    next_step: typeof data.next_step === 'string' ? data.next_step : '',
    state_update: isPlainObject(data.state_update) ? data.state_update : null,
    sanitized,
  };
}
