import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppServices } from '../container';
import { env } from '../config/env';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseOrThrow, phoneParam } from './validation';

const listQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  customer_type: z.enum(['business', 'consumer']).optional(),
  escalated: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
});

const searchQuery = z.object({
  q: z.string().trim().min(1, 'q is required'),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const highValueQuery = z.object({
  min_spend: z.coerce.number().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

const nullableText = z.string().trim().min(1).nullable().optional();

const updateSchema = z
  .object({
    customer_name: nullableText,
    email: z.string().email().nullable().optional(),
    address: nullableText,
    customer_type: z.enum(['business', 'consumer']).optional(),
    company_name: nullableText,
    total_spend: z.number().nonnegative().optional(),
    is_active: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
    socials: z.array(z.string()).optional(),
    interest_groups: z.array(z.string()).optional(),
  })
  .strict();

export function createCustomerRouter(
  services: Pick<AppServices, 'customers'>,
  highValueThreshold: number = env.HIGH_VALUE_SPEND
): Router {
  const router = Router();
  const customers = services.customers;

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit, customer_type, escalated } = parseOrThrow(listQuery, req.query);
      const list = await customers.listCustomers({ limit, customerType: customer_type, escalated });
      res.json({ success: true, customers: list, count: list.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q, limit } = parseOrThrow(searchQuery, req.query);
      const matches = await customers.searchCustomers(q, limit);
      res.json({ success: true, ...matches, query: q });
    } catch (error) {
      next(error);
    }
  });

  router.get('/high-value', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { min_spend = highValueThreshold, limit } = parseOrThrow(highValueQuery, req.query);
      const matches = await customers.listHighValueCustomers(min_spend, limit);
      res.json({ success: true, ...matches, min_spend_threshold: min_spend });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const customer = await customers.getCustomerByPhone(phone);
      if (!customer) {
        throw new NotFoundError(`Customer ${phone} not found`);
      }
      res.json({ success: true, customer });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const updates = parseOrThrow(updateSchema, req.body);
      const customer = await customers.updateCustomer(phone, updates);
      if (!customer) {
        throw new NotFoundError(`Customer ${phone} not found`);
      }
      res.json({ success: true, customer });
    } catch (error) {
      next(error);
    }
  });

  const setEscalation = (status: boolean) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = parseOrThrow(phoneParam, req.params.phone);
      const updated = await customers.updateEscalationStatus(phone, status);
      if (!updated) {
        throw new NotFoundError(`Customer ${phone} not found`);
      }
      logger.info('Escalation status changed from dashboard', { phone, status });
      res.json({ success: true, phone_number: phone, escalation_status: status });
    } catch (error) {
      next(error);
    }
  };

  router.post('/:phone/escalate', setEscalation(true));
  router.post('/:phone/de-escalate', setEscalation(false));

  return router;
}
