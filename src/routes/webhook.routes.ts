import { Router, Request, Response } from 'express';
import { InboundJobData } from '../types/jobs';
import { Channel } from '../types/agent';
import { InboundWhatsAppMessage } from '../services/whatsapp/whatsapp.adapter';
import { parseMetaInbound } from '../services/whatsapp/meta.adapter';
import { parseTwilioInbound } from '../services/whatsapp/twilio.adapter';
import { metaSignatureValidator, twilioSignatureValidator, TwilioValidatorOptions } from '../middleware/signature';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

const EMPTY_TWIML = '<Response></Response>';

export interface WebhookRouterDeps {
  enqueue: (data: InboundJobData) => Promise<void>;
  verifyToken?: string;
  appSecret?: string;
  twilio: TwilioValidatorOptions;
}

function toJob(inbound: InboundWhatsAppMessage, channel: Channel): InboundJobData {
  return { phone: inbound.from, text: inbound.text, message_id: inbound.messageId, channel };
}

/**
 * Webhooks only parse and enqueue. Anything that parsed answers 200 so the
 * provider does not redeliver; a message that could not be queued answers
 * 503 so it does.
 */
export function createWebhookRouter(deps: WebhookRouterDeps): Router {
  const router = Router();

  router.get('/whatsapp', (req: Request, res: Response) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && deps.verifyToken && token === deps.verifyToken && typeof challenge === 'string') {
      logger.info('Meta webhook verified');
      return res.status(200).type('text/plain').send(challenge);
    }

    logger.warn('Meta webhook verification failed', { mode });
    res.status(403).json({ error: 'Verification failed' });
  });

  router.post('/whatsapp', metaSignatureValidator(deps.appSecret), async (req: Request, res: Response) => {
    const inbound = parseMetaInbound(req.body);
    if (!inbound) {
      return res.status(200).json({ status: 'ignored' });
    }

    try {
      await deps.enqueue(toJob(inbound, 'meta'));
      res.status(200).json({ status: 'received' });
    } catch (error) {
      logger.error('Meta webhook enqueue failed', { from: inbound.from, error: toError(error).message });
      res.status(503).json({ status: 'error' });
    }
  });

  router.post('/whatsapp/twilio', twilioSignatureValidator(deps.twilio), async (req: Request, res: Response) => {
    const inbound = parseTwilioInbound(req.body);
    if (!inbound) {
      return res.type('text/xml').send(EMPTY_TWIML);
    }

    try {
      await deps.enqueue(toJob(inbound, 'twilio'));
      res.type('text/xml').send(EMPTY_TWIML);
    } catch (error) {
      logger.error('Twilio webhook enqueue failed', { from: inbound.from, error: toError(error).message });
      res.status(503).type('text/xml').send(EMPTY_TWIML);
    }
  });

  return router;
}
