import sgMail from '@sendgrid/mail';
import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';

export interface SendGridConfig {
  apiKey?: string;
  fromEmail?: string;
}

export class SendGridAdapter {
  constructor(private config: SendGridConfig) {
    if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
    }
  }

  /** Returns false when SendGrid is not configured. */
  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean> {
    const from = this.config.fromEmail;
    if (!this.config.apiKey || !from) {
      logger.warn('SendGrid not configured, skipping email', { subject });
      return false;
    }

    try {
      await sgMail.send({
        to,
        from,
        subject,
        text,
        html: html || text,
      });

      logger.info('Email sent', { to, subject });
      return true;
    } catch (error) {
      logger.error('SendGrid email failed', { to, subject, error: toError(error).message });
      throw error;
    }
  }
}
