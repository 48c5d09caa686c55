import crypto from 'crypto';
import { IncomingMessage } from 'http';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import twilio from 'twilio';
import { logger } from '../utils/logger';

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/** `verify` hook for express.json: keeps the exact bytes Meta signed. */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function isValidMetaSignature(appSecret: string, rawBody: Buffer, header: string | undefined): boolean {
  if (!header || !header.startsWith('sha256=')) return false;

  const expected = crypto.createHmac('sha256', appSecret).update(rawBody).digest('hex');
  const received = header.slice('sha256='.length);
  if (received.length !== expected.length) return false;

  return crypto.timingSafeEqual(Buffer.from(received), Buffer.from(expected));
}

/** Checks X-Hub-Signature-256 when an app secret is configured. */
export function metaSignatureValidator(appSecret: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!appSecret) {
      return next();
    }

    const rawBody = rawBodies.get(req) ?? Buffer.alloc(0);
    if (!isValidMetaSignature(appSecret, rawBody, req.get('x-hub-signature-256'))) {
      logger.warn('Invalid Meta webhook signature', { path: req.path });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}

export interface TwilioValidatorOptions {
  authToken?: string;
  baseUrl: string;
  /** Development skips validation. */
  enabled: boolean;
}

export function twilioSignatureValidator(options: TwilioValidatorOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!options.enabled) {
      return next();
    }

    const signature = req.get('x-twilio-signature');
    if (!signature) {
      logger.warn('Missing Twilio signature');
      return res.status(403).json({ error: 'Missing signature' });
    }

    if (!options.authToken) {
      logger.warn('Twilio auth token not configured');
      return res.status(503).json({ error: 'Twilio not configured' });
    }

    const url = `${options.baseUrl}${req.originalUrl}`;
    if (!twilio.validateRequest(options.authToken, signature, url, req.body)) {
      logger.warn('Invalid Twilio signature', { url });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}
