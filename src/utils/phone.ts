/**
 * Canonical phone key: digits only, as WhatsApp reports senders
 * ("+39 333 1234567", "whatsapp:+393331234567" → "393331234567").
 */
export function normalizePhone(raw: string | number | null | undefined): string {
  if (raw === null || raw === undefined) return '';
  return String(raw)
    .trim()
    .replace(/^whatsapp:/i, '')
    .replace(/[+\s]/g, '');
}
