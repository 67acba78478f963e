import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppServices } from '../container';
import { NotFoundError } from '../utils/errors';
import { parseOrThrow, phoneParam } from './validation';

const pageQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  messages_count: z.coerce.number().int().min(1).max(100).default(20),
});

const senderSchema = z.enum(['agent', 'representative']).default('representative');

const sendSchema = z.object({
  content: z.string().min(1).max(4096),
  sender: senderSchema,
});

const sendMediaSchema = z.object({
  kind: z.enum(['image', 'audio', 'document']),
  url: z.string().url(),
  caption: z.string().max(1024).optional(),
  sender: senderSchema,
});

export function createChatRouter(services: Pick<AppServices, 'conversation'>): Router {
  const router = Router();

  router.get('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const { page, messages_count } = parseOrThrow(pageQuery, req.query);

      const history = await services.conversation.getRecentHistory(phone, page, messages_count);
      if (!history) {
        throw new NotFoundError(`No chat history for ${phone}`);
      }
      res.json({ success: true, ...history });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:phone/send', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const { content, sender } = parseOrThrow(sendSchema, req.body);

      const message = await services.conversation.sendOutboundMessage(phone, content, sender);
      res.status(201).json({ success: true, message });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:phone/send-media', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const { kind, url, caption, sender } = parseOrThrow(sendMediaSchema, req.body);

      const message = await services.conversation.sendOutboundMedia(phone, kind, url, caption, sender);
      res.status(201).json({ success: true, message });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
