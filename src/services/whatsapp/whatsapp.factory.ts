import { WhatsAppAdapter, WhatsAppProvider } from './whatsapp.adapter';
import { MetaAdapter } from './meta.adapter';
import { TwilioWhatsAppAdapter } from './twilio.adapter';
import type { Env } from '../../config/env';

export type WhatsAppSettings = Pick<
  Env,
  | 'WHATSAPP_ACCESS_TOKEN'
  | 'WHATSAPP_PHONE_NUMBER_ID'
  | 'WHATSAPP_API_VERSION'
  | 'WHATSAPP_TEMPLATE_NAME'
  | 'WHATSAPP_TEMPLATE_LANGUAGE'
  | 'WHATSAPP_TEMPLATE_DOCUMENT_URL'
  | 'WHATSAPP_TEMPLATE_DOCUMENT_FILENAME'
  | 'TWILIO_ACCOUNT_SID'
  | 'TWILIO_AUTH_TOKEN'
  | 'TWILIO_WHATSAPP_NUMBER'
  | 'TWILIO_TEMPLATE_SID'
>;

export class WhatsAppFactory {
  static create(provider: WhatsAppProvider, settings: WhatsAppSettings): WhatsAppAdapter {
    switch (provider) {
      case 'meta':
        return new MetaAdapter({
          accessToken: settings.WHATSAPP_ACCESS_TOKEN ?? '',
          phoneNumberId: settings.WHATSAPP_PHONE_NUMBER_ID ?? '',
          apiVersion: settings.WHATSAPP_API_VERSION,
          templateName: settings.WHATSAPP_TEMPLATE_NAME,
          templateLanguage: settings.WHATSAPP_TEMPLATE_LANGUAGE,
          documentUrl: settings.WHATSAPP_TEMPLATE_DOCUMENT_URL,
          documentFilename: settings.WHATSAPP_TEMPLATE_DOCUMENT_FILENAME,
        });
      case 'twilio':
        return new TwilioWhatsAppAdapter({
          accountSid: settings.TWILIO_ACCOUNT_SID ?? '',
          authToken: settings.TWILIO_AUTH_TOKEN ?? '',
          fromNumber: settings.TWILIO_WHATSAPP_NUMBER ?? '',
          templateSid: settings.TWILIO_TEMPLATE_SID,
        });
      default:
        throw new Error(`Unsupported WhatsApp provider: ${String(provider)}`);
    }
  }
}
