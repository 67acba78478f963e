import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
  OPENAI_API_KEY: z.string().min(1),
  CHANNEL_PROVIDER: z.enum(['whatsapp_cloud', 'twilio']).default('whatsapp_cloud'),
  WHATSAPP_ACCESS_TOKEN: optionalString,
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  WHATSAPP_VERIFY_TOKEN: optionalString,
  WHATSAPP_APP_SECRET: optionalString,
  WHATSAPP_BOT_NUMBER: z.string().default('15551304374'),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  QUICKBOOKS_BASE_URL: z.string().default('https://quickbooks.api.intuit.com'),
  QUICKBOOKS_REALM_ID: optionalString,
  QUICKBOOKS_ACCESS_TOKEN: optionalString,
  SHOPIFY_STORE_DOMAIN: optionalString,
  SHOPIFY_ACCESS_TOKEN: optionalString,
  CHANNEL_TIMEZONE: z.string().default('Asia/Karachi'),
  HISTORY_WINDOW: z.coerce.number().int().positive().default(20),
  HIGH_VALUE_SPEND: z.coerce.number().nonnegative().default(10000),
  BRAND_NAME: z.string().default('our WhatsApp assistant'),
  DEFAULT_CAMPAIGN_CODE: z.string().regex(/^[A-Z]{4}$/).default('WELC'),
  API_KEYS: optionalString,
  SENTRY_DSN: optionalString,
  WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
