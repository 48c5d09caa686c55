export type WhatsAppProvider = 'meta' | 'twilio';

export interface WhatsAppAdapter {
  readonly provider: WhatsAppProvider;
  sendText(to: string, body: string): Promise<void>;
  /** Sends the onboarding template; a parameter-count rejection is retried once with the first parameter only. */
  sendTemplate(to: string, params: TemplateParams): Promise<void>;
}

/** An inbound text message; the webhook parsers return null for status callbacks, media and reactions. */
export interface InboundWhatsAppMessage {
  from: string;
  text: string;
  messageId: string | null;
  provider: WhatsAppProvider;
}

export interface TemplateParams {
  name: string | null;
  company: string | null;
  position: string | null;
}

export const DEFAULT_TEMPLATE_NAME = 'Amico';

/** Body parameters in template order: first name, company, position. */
export function buildTemplateBodyParameters(params: TemplateParams): string[] {
  return [
    params.name?.trim() || DEFAULT_TEMPLATE_NAME,
    params.company?.trim() || '-',
    params.position?.trim() || '-',
  ];
}

export const PARAM_MISMATCH_DETAILS = 'does not match the expected number of params';
