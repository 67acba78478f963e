import { z } from 'zod';
import { ValidationError } from '../utils/errors';

export const phoneParam = z.string().regex(/^\d{6,15}$/, 'phone must be 6-15 digits');

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join(', '));
  }
  return parsed.data;
}
