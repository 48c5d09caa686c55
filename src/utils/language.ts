export type Language = 'it' | 'en';

const IT_MARKERS = [
  'ciao', 'grazie', 'buongiorno', 'buonasera', 'buonanotte', 'salve',
  'nome', 'cognome', 'documento', 'firma', 'codice', 'come', 'cosa',
  'residenza', 'comune', 'registrati', 'verifica', 'italiano',
  'esempio', 'posso', 'aiuto', 'piacere', 'scusa', 'prego', 'certo',
];

const EN_MARKERS = [
  'hello', 'hi', 'hey', 'thanks', 'thank', 'good morning', 'good evening',
  'good night', 'name', 'surname', 'document', 'signature', 'code',
  'how', 'what', 'where', 'register', 'verify', 'english',
  'example', 'can', 'help', 'please', 'sorry', 'sure', 'yes', 'no',
];

const IT_FUNCTION_WORDS = ['perché', 'che', 'del', 'della', 'gli'];
const IT_DIACRITICS = /[àèéìòù]/;
const IT_BONUS = 2;

function tokenize(text: string): string[] {
  return text.split(/[^\p{L}\p{N}]+/u).filter((token) => token.length > 0);
}

function countMarkers(text: string, words: Set<string>, markers: string[]): number {
  return markers.filter((marker) =>
    marker.includes(' ') ? text.includes(marker) : words.has(marker)
  ).length;
}

/**
 * Classifies text as Italian or English by marker scoring. Never throws;
 * empty or marker-free input is English.
 */
export function detectLanguage(text: string | null | undefined): Language {
  if (!text) return 'en';

  const normalized = text.trim().toLowerCase();
  if (!normalized) return 'en';

  const words = new Set(tokenize(normalized));
  const hasDiacritic = IT_DIACRITICS.test(normalized);

  let itScore = countMarkers(normalized, words, IT_MARKERS);
  const enScore = countMarkers(normalized, words, EN_MARKERS);

  if (hasDiacritic || IT_FUNCTION_WORDS.some((word) => words.has(word))) {
    itScore += IT_BONUS;
  }

  if (itScore > enScore) return 'it';
  if (enScore > itScore) return 'en';
  if (itScore > 0 && hasDiacritic) return 'it';
  return 'en';
}

export function languageName(lang: Language): string {
  return lang === 'it' ? 'Italian' : 'English';
}
