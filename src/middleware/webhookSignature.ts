import crypto from 'crypto';
import { IncomingMessage } from 'http';
import { Request, Response, NextFunction } from 'express';
import twilio from 'twilio';
import { env } from '../config/env';
import { logger } from '../utils/logger';

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/** `verify` hook for express.json that keeps the exact bytes the signature covers. */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function isValidHubSignature(rawBody: Buffer, header: string, secret: string): boolean {
  const expected = `sha256=${crypto.createHmac('sha256', secret).update(rawBody).digest('hex')}`;
  const a = Buffer.from(expected);
  const b = Buffer.from(header);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Checks `X-Hub-Signature-256` on WhatsApp Cloud callbacks. */
export function validateWhatsAppSignature(req: Request, res: Response, next: NextFunction) {
  const secret = env.WHATSAPP_APP_SECRET;

  if (!secret) {
    if (env.NODE_ENV === 'development') {
      return next();
    }
    logger.warn('WhatsApp app secret not configured');
    return res.status(503).json({ error: 'WhatsApp not configured' });
  }

  const signature = req.get('x-hub-signature-256');
  const rawBody = rawBodies.get(req);
  if (!signature || !rawBody) {
    logger.warn('Missing WhatsApp signature');
    return res.status(403).json({ error: 'Missing signature' });
  }

  if (!isValidHubSignature(rawBody, signature, secret)) {
    logger.warn('Invalid WhatsApp signature');
    return res.status(403).json({ error: 'Invalid signature' });
  }

  next();
}

export function validateTwilioSignature(req: Request, res: Response, next: NextFunction) {
  if (env.NODE_ENV === 'development') {
    return next();
  }

  const signature = req.get('x-twilio-signature');
  if (!signature) {
    logger.warn('Missing Twilio signature');
    return res.status(403).json({ error: 'Missing signature' });
  }

  if (!env.TWILIO_AUTH_TOKEN) {
    logger.warn('Twilio auth token not configured');
    return res.status(503).json({ error: 'Twilio not configured' });
  }

  const url = `${env.WEBHOOK_BASE_URL}${req.originalUrl}`;
  if (!twilio.validateRequest(env.TWILIO_AUTH_TOKEN, signature, url, req.body)) {
    logger.warn('Invalid Twilio signature', { url });
    return res.status(403).json({ error: 'Invalid signature' });
  }

  next();
}
