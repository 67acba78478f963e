import { Router, Request, Response } from 'express';
import { env } from '../config/env';
import type { AppServices } from '../container';
import { isVoicePayload } from '../services/channel/whatsapp-cloud.adapter';
import { validateTwilioSignature, validateWhatsAppSignature } from '../middleware/webhookSignature';
import { logger } from '../utils/logger';

export function createWebhookRouter(services: Pick<AppServices, 'conversation'>): Router {
  const router = Router();

  // Meta subscription handshake
  router.get('/', (req: Request, res: Response) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && env.WHATSAPP_VERIFY_TOKEN && token === env.WHATSAPP_VERIFY_TOKEN) {
      logger.info('Webhook verified');
      return res.type('text/plain').send(typeof challenge === 'string' ? challenge : '');
    }

    logger.warn('Webhook verification failed', { mode });
    res.status(403).send('Invalid verification');
  });

  router.post('/', validateWhatsAppSignature, async (req: Request, res: Response) => {
    const outcome = await services.conversation.processInboundMessage(req.body, isVoicePayload(req.body));
    logger.debug('WhatsApp webhook handled', { action: outcome.action_taken, phone: outcome.phone_number });
    // Always acknowledge so Meta does not redeliver
    res.status(200).send('EVENT_RECEIVED');
  });

  router.post('/twilio', validateTwilioSignature, async (req: Request, res: Response) => {
    const contentType = req.body?.MediaContentType0;
    const isVoice = typeof contentType === 'string' && contentType.startsWith('audio/');
    const outcome = await services.conversation.processInboundMessage(req.body, isVoice);
    logger.debug('Twilio webhook handled', { action: outcome.action_taken, phone: outcome.phone_number });
    // Empty TwiML: replies go out through the API
    res.type('text/xml').send('<Response></Response>');
  });

  return router;
}
