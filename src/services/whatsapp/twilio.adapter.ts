import twilio from 'twilio';
import {
  InboundWhatsAppMessage,
  PARAM_MISMATCH_DETAILS,
  TemplateParams,
  WhatsAppAdapter,
  buildTemplateBodyParameters,
} from './whatsapp.adapter';
import { normalizePhone } from '../../utils/phone';
import { logger } from '../../utils/logger';
import { WhatsAppError, toError } from '../../utils/errors';

const PARAM_MISMATCH_CODE = 63028;

export interface TwilioWhatsAppConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  templateSid?: string;
}

function isParamMismatch(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === PARAM_MISMATCH_CODE) return true;
  return 'message' in error && typeof error.message === 'string' && error.message.includes(PARAM_MISMATCH_DETAILS);
}

function toAddress(phone: string): string {
  return `whatsapp:+${normalizePhone(phone)}`;
}

function readString(payload: Record<string, unknown>, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** Form-encoded Twilio webhook fields: From, Body, MessageSid. */
export function parseTwilioInbound(payload: unknown): InboundWhatsAppMessage | null {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return null;
  }

  const fields: Record<string, unknown> = { ...payload };
  const from = readString(fields, 'From');
  const body = readString(fields, 'Body');
  if (!from || !body) return null;

  return {
    from: normalizePhone(from),
    text: body,
    messageId: readString(fields, 'MessageSid'),
    provider: 'twilio',
  };
}

export class TwilioWhatsAppAdapter implements WhatsAppAdapter {
  readonly provider = 'twilio' as const;
  private client: ReturnType<typeof twilio>;

  constructor(private config: TwilioWhatsAppConfig) {
    if (!config.accountSid || !config.authToken || !config.fromNumber) {
      throw new WhatsAppError('twilio', 'init', new Error('Missing Twilio credentials'));
    }
    this.client = twilio(config.accountSid, config.authToken);
  }

  async sendText(to: string, body: string): Promise<void> {
    try {
      await this.client.messages.create({ from: toAddress(this.config.fromNumber), to: toAddress(to), body });
      logger.info('WhatsApp text sent', { provider: 'twilio', to });
    } catch (error) {
      logger.warn('WhatsApp text send failed', { provider: 'twilio', to, error: toError(error).message });
      throw new WhatsAppError('twilio', 'sendText', toError(error));
    }
  }

  async sendTemplate(to: string, params: TemplateParams): Promise<void> {
    const templateSid = this.config.templateSid;
    if (!templateSid) {
      throw new WhatsAppError('twilio', 'sendTemplate', new Error('TWILIO_TEMPLATE_SID not configured'));
    }

    const bodyParameters = buildTemplateBodyParameters(params);
    const send = (values: string[]) =>
      this.client.messages.create({
        from: toAddress(this.config.fromNumber),
        to: toAddress(to),
        contentSid: templateSid,
        contentVariables: JSON.stringify(Object.fromEntries(values.map((value, i) => [String(i + 1), value]))),
      });

    try {
      await send(bodyParameters);
      logger.info('WhatsApp template sent', { provider: 'twilio', to });
      return;
    } catch (error) {
      if (!isParamMismatch(error)) {
        throw new WhatsAppError('twilio', 'sendTemplate', toError(error));
      }
      logger.warn('Template parameter mismatch, retrying with first parameter only', { to });
    }

    try {
      await send(bodyParameters.slice(0, 1));
      logger.info('WhatsApp template sent with reduced parameters', { provider: 'twilio', to });
    } catch (error) {
      throw new WhatsAppError('twilio', 'sendTemplate', toError(error));
    }
  }
}
