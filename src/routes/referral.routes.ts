import { Router, Request, Response, NextFunction } from 'express';
import type { AppServices } from '../container';
import { parseOrThrow, phoneParam } from './validation';

export function createReferralRouter(services: Pick<AppServices, 'conversation'>): Router {
  const router = Router();

  router.post('/:phone/invite', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const invite = await services.conversation.generateReferralInvite(phone);
      res.json({ success: true, phone_number: phone, invite });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
