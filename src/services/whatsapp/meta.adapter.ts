import { z } from 'zod';
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

const GRAPH_BASE_URL = 'https://graph.facebook.com';
const PARAM_MISMATCH_CODE = 132000;

export interface MetaConfig {
  accessToken: string;
  phoneNumberId: string;
  apiVersion: string;
  templateName: string;
  templateLanguage: string;
  documentUrl?: string;
  documentFilename: string;
}

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
    error_data: z.object({ details: z.string().optional() }).optional(),
  }),
});

const inboundSchema = z.object({
  entry: z.array(
    z.object({
      changes: z.array(
        z.object({
          value: z.object({
            messages: z
              .array(
                z.object({
                  from: z.string(),
                  id: z.string().optional(),
                  type: z.string().optional(),
                  text: z.object({ body: z.string() }).optional(),
                })
              )
              .optional(),
          }),
        })
      ),
    })
  ),
});

export class GraphApiError extends Error {
  constructor(
    public status: number,
    public code: number | null,
    public details: string | null,
    message: string
  ) {
    super(message);
    Object.setPrototypeOf(this, GraphApiError.prototype);
  }

  get isParamMismatch(): boolean {
    return this.code === PARAM_MISMATCH_CODE || (this.details?.includes(PARAM_MISMATCH_DETAILS) ?? false);
  }
}

/** First text message of a Cloud API webhook; null for status callbacks and non-text messages. */
export function parseMetaInbound(payload: unknown): InboundWhatsAppMessage | null {
  const parsed = inboundSchema.safeParse(payload);
  if (!parsed.success) return null;

  const message = parsed.data.entry[0]?.changes[0]?.value.messages?.[0];
  if (!message || !message.text || (message.type && message.type !== 'text')) {
    return null;
  }

  return {
    from: normalizePhone(message.from),
    text: message.text.body,
    messageId: message.id ?? null,
    provider: 'meta',
  };
}

export class MetaAdapter implements WhatsAppAdapter {
  readonly provider = 'meta' as const;

  constructor(private config: MetaConfig) {
    if (!config.accessToken || !config.phoneNumberId) {
      throw new WhatsAppError('meta', 'init', new Error('Missing WhatsApp Cloud API credentials'));
    }
  }

  async sendText(to: string, body: string): Promise<void> {
    try {
      await this.post({
        messaging_product: 'whatsapp',
        to,
        type: 'text',
        text: { body },
      });
      logger.info('WhatsApp text sent', { provider: 'meta', to });
    } catch (error) {
      logger.warn('WhatsApp text send failed', { provider: 'meta', to, error: toError(error).message });
      throw this.wrap('sendText', error);
    }
  }

  async sendTemplate(to: string, params: TemplateParams): Promise<void> {
    const bodyParameters = buildTemplateBodyParameters(params);

    try {
      await this.post(this.templatePayload(to, bodyParameters));
      logger.info('WhatsApp template sent', { provider: 'meta', to, template: this.config.templateName });
      return;
    } catch (error) {
      if (!(error instanceof GraphApiError) || !error.isParamMismatch) {
        throw this.wrap('sendTemplate', error);
      }
      logger.warn('Template parameter mismatch, retrying with first parameter only', { to, details: error.details });
    }

    try {
      await this.post(this.templatePayload(to, bodyParameters.slice(0, 1)));
      logger.info('WhatsApp template sent with reduced parameters', { provider: 'meta', to });
    } catch (error) {
      throw this.wrap('sendTemplate', error);
    }
  }

  private templatePayload(to: string, bodyParameters: string[]): Record<string, unknown> {
    const components: Record<string, unknown>[] = [];

    if (this.config.documentUrl) {
      components.push({
        type: 'header',
        parameters: [
          {
            type: 'document',
            document: { link: this.config.documentUrl, filename: this.config.documentFilename },
          },
        ],
      });
    }

    components.push({
      type: 'body',
      parameters: bodyParameters.map((text) => ({ type: 'text', text })),
    });

    return {
      messaging_product: 'whatsapp',
      to,
      type: 'template',
      template: {
        name: this.config.templateName,
        language: { code: this.config.templateLanguage },
        components,
      },
    };
  }

  private async post(body: Record<string, unknown>): Promise<void> {
    const url = `${GRAPH_BASE_URL}/${this.config.apiVersion}/${this.config.phoneNumberId}/messages`;
    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });

    if (res.ok) return;

    const errorBody: unknown = await res.json().catch(() => null);
    const parsed = graphErrorSchema.safeParse(errorBody);
    if (!parsed.success) {
      throw new GraphApiError(res.status, null, null, `Graph API returned ${res.status}`);
    }

    const { message, code, error_data } = parsed.data.error;
    throw new GraphApiError(
      res.status,
      code ?? null,
      error_data?.details ?? null,
      message ?? `Graph API returned ${res.status}`
    );
  }

  private wrap(operation: string, error: unknown): WhatsAppError {
    const details = error instanceof GraphApiError ? error.details : null;
    return new WhatsAppError('meta', operation, toError(error), details);
  }
}
