import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { query } from '../config/database';
import { CustomerStats, MessageStats, SpendLeader } from '../types/analytics';
import { CustomerProfile, CustomerUpdate, NewCustomer } from '../types/customer';
import { ChatMessage } from '../types/conversation';
import { ReferralRecord, ReferredUser } from '../types/referral';
import {
  AnalyticsStore,
  CampaignStore,
  ChatHistoryStore,
  CustomerListFilter,
  CustomerMatches,
  CustomerStore,
  ReferralStore,
} from '../types/store';
import { logger } from '../utils/logger';
import { DataIntegrityError } from '../utils/errors';

const customerRowSchema = z.object({
  phone_number: z.string(),
  customer_name: z.string().nullable(),
  email: z.string().nullable(),
  address: z.string().nullable(),
  customer_type: z.enum(['business', 'consumer']).nullable(),
  accounting_id: z.string().nullable(),
  storefront_id: z.string().nullable(),
  company_name: z.string().nullable(),
  // NUMERIC comes back from pg as a string
  total_spend: z.coerce.number().nonnegative(),
  is_active: z.boolean(),
  escalation_status: z.boolean(),
  tags: z.array(z.string()),
  socials: z.array(z.string()),
  interest_groups: z.array(z.string()),
  created_at: z.coerce.date().transform((d) => d.toISOString()),
  updated_at: z.coerce.date().transform((d) => d.toISOString()),
});

const chatMessageRowSchema = z.object({
  time_stamp: z.string(),
  content: z.string(),
  message_type: z.enum(['text', 'image', 'audio', 'document']),
  sender: z.enum(['customer', 'agent', 'representative']),
});

export const referralRowSchema = z.object({
  referral_code: z.string().regex(/^[A-Z]{6}$/),
  referrer_id: z.string().nullable(),
  referrer_phone: z.string().nullable(),
  referrer_name: z.string().nullable(),
  referrer_email: z.string().nullable(),
  total_points: z.number().int().nonnegative(),
  referred_users: z.array(z.object({ phone_number: z.string(), time_stamp: z.string() })),
  campaign_id: z.string().nullable(),
});

// COUNT and SUM come back from pg as strings
const countValue = z.coerce.number().int().nonnegative();

const totalCountSchema = z.object({ total_count: countValue });

const customerStatsRowSchema = z.object({
  total: countValue,
  active: countValue,
  escalated: countValue,
  business: countValue,
  consumer: countValue,
  escalated_business: countValue,
  escalated_consumer: countValue,
  total_spend: z.coerce.number().nonnegative(),
  high_value: countValue,
});

const spendLeaderRowSchema = z.object({
  phone_number: z.string(),
  customer_name: z.string().nullable(),
  customer_type: z.enum(['business', 'consumer']).nullable(),
  total_spend: z.coerce.number().nonnegative(),
});

const messageTotalsRowSchema = z.object({ conversations: countValue, messages: countValue });

const messageTypeRowSchema = z.object({
  message_type: chatMessageRowSchema.shape.message_type,
  count: countValue,
});

const CUSTOMER_COLUMNS = [
  'customer_name',
  'email',
  'address',
  'customer_type',
  'accounting_id',
  'storefront_id',
  'company_name',
  'total_spend',
  'is_active',
  'tags',
  'socials',
  'interest_groups',
] as const;

type CustomerColumn = (typeof CUSTOMER_COLUMNS)[number];

function isCustomerColumn(key: string): key is CustomerColumn {
  return CUSTOMER_COLUMNS.some((column) => column === key);
}

function parseCustomer(row: unknown): CustomerProfile {
  const parsed = customerRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new DataIntegrityError('customer', 'row', parsed.error.message);
  }
  return parsed.data;
}

function parseMatches(rows: unknown[]): CustomerMatches {
  const first = rows[0];
  return {
    customers: rows.map(parseCustomer),
    total: first === undefined ? 0 : totalCountSchema.parse(first).total_count,
  };
}

/** Escapes LIKE wildcards so the term matches literally. */
export function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function parseReferral(row: unknown, key: string): ReferralRecord {
  const parsed = referralRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new DataIntegrityError('referral', key, parsed.error.message);
  }
  return parsed.data;
}

/**
 * PostgreSQL implementation of every record store. Callers depend on the store
 * interfaces, never on this class.
 */
export class DatabaseService implements CustomerStore, ChatHistoryStore, ReferralStore, CampaignStore, AnalyticsStore {
  // ── Customers ──────────────────────────────────────────

  async getCustomerByPhone(phone: string): Promise<CustomerProfile | null> {
    const result = await query('SELECT * FROM customers WHERE phone_number = $1', [phone]);
    return result.rows[0] ? parseCustomer(result.rows[0]) : null;
  }

  async createCustomer(customer: NewCustomer): Promise<CustomerProfile> {
    const result = await query(
      `INSERT INTO customers (
         phone_number, customer_name, email, address, customer_type, accounting_id,
         storefront_id, company_name, total_spend, is_active, escalation_status,
         tags, socials, interest_groups
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
       RETURNING *`,
      [
        customer.phone_number,
        customer.customer_name ?? null,
        customer.email ?? null,
        customer.address ?? null,
        customer.customer_type ?? 'consumer',
        customer.accounting_id ?? null,
        customer.storefront_id ?? null,
        customer.company_name ?? null,
        customer.total_spend ?? 0,
        customer.is_active ?? true,
        customer.escalation_status ?? false,
        customer.tags ?? [],
        customer.socials ?? [],
        customer.interest_groups ?? [],
      ]
    );

    logger.info('Customer created', { phone: customer.phone_number });
    return parseCustomer(result.rows[0]);
  }

  async updateCustomer(phone: string, updates: CustomerUpdate): Promise<CustomerProfile | null> {
    const sets: string[] = [];
    const params: unknown[] = [phone];

    for (const [key, value] of Object.entries(updates)) {
      if (!isCustomerColumn(key) || value === undefined) continue;
      params.push(value);
      sets.push(`${key} = $${params.length}`);
    }

    if (sets.length === 0) {
      return this.getCustomerByPhone(phone);
    }

    const result = await query(
      `UPDATE customers SET ${sets.join(', ')}, updated_at = NOW()
       WHERE phone_number = $1
       RETURNING *`,
      params
    );
    return result.rows[0] ? parseCustomer(result.rows[0]) : null;
  }

  async updateEscalationStatus(phone: string, status: boolean): Promise<boolean> {
    const result = await query(
      `UPDATE customers SET escalation_status = $2, updated_at = NOW() WHERE phone_number = $1`,
      [phone, status]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listCustomers(filter: CustomerListFilter): Promise<CustomerProfile[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.customerType) {
      params.push(filter.customerType);
      conditions.push(`customer_type = $${params.length}`);
    }
    if (filter.escalated !== undefined) {
      params.push(filter.escalated);
      conditions.push(`escalation_status = $${params.length}`);
    }

    params.push(filter.limit);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await query(
      `SELECT * FROM customers ${where} ORDER BY updated_at DESC LIMIT $${params.length}`,
      params
    );
    return result.rows.map(parseCustomer);
  }

  async searchCustomers(term: string, limit: number): Promise<CustomerMatches> {
    const result = await query(
      `SELECT *, COUNT(*) OVER () AS total_count FROM customers
       WHERE customer_name ILIKE $1 OR phone_number ILIKE $1 OR company_name ILIKE $1 OR email ILIKE $1
       ORDER BY updated_at DESC LIMIT $2`,
      [likePattern(term), limit]
    );
    return parseMatches(result.rows);
  }

  async listHighValueCustomers(minSpend: number, limit: number): Promise<CustomerMatches> {
    const result = await query(
      `SELECT *, COUNT(*) OVER () AS total_count FROM customers
       WHERE total_spend >= $1
       ORDER BY total_spend DESC, phone_number ASC LIMIT $2`,
      [minSpend, limit]
    );
    return parseMatches(result.rows);
  }

  // ── Analytics ──────────────────────────────────────────

  async getCustomerStats(highValueThreshold: number): Promise<CustomerStats> {
    const result = await query(
      `SELECT
         COUNT(*) AS total,
         COUNT(*) FILTER (WHERE is_active) AS active,
         COUNT(*) FILTER (WHERE escalation_status) AS escalated,
         COUNT(*) FILTER (WHERE customer_type = 'business') AS business,
         COUNT(*) FILTER (WHERE customer_type = 'consumer') AS consumer,
         COUNT(*) FILTER (WHERE escalation_status AND customer_type = 'business') AS escalated_business,
         COUNT(*) FILTER (WHERE escalation_status AND customer_type = 'consumer') AS escalated_consumer,
         COALESCE(SUM(total_spend), 0) AS total_spend,
         COUNT(*) FILTER (WHERE total_spend >= $1) AS high_value
       FROM customers`,
      [highValueThreshold]
    );
    return customerStatsRowSchema.parse(result.rows[0]);
  }

  async getTopCustomersBySpend(limit: number): Promise<SpendLeader[]> {
    const result = await query(
      `SELECT phone_number, customer_name, customer_type, total_spend FROM customers
       ORDER BY total_spend DESC, phone_number ASC LIMIT $1`,
      [limit]
    );
    return result.rows.map((row) => spendLeaderRowSchema.parse(row));
  }

  async getMessageStats(): Promise<MessageStats> {
    const [totals, byType] = await Promise.all([
      query('SELECT COUNT(DISTINCT phone_number) AS conversations, COUNT(*) AS messages FROM chat_messages'),
      query('SELECT message_type, COUNT(*) AS count FROM chat_messages GROUP BY message_type'),
    ]);

    const { conversations, messages } = messageTotalsRowSchema.parse(totals.rows[0]);
    const message_types = { text: 0, image: 0, audio: 0, document: 0 };
    for (const row of byType.rows) {
      const parsed = messageTypeRowSchema.parse(row);
      message_types[parsed.message_type] = parsed.count;
    }

    return { total_conversations: conversations, total_messages: messages, message_types };
  }

  // ── Chat history ───────────────────────────────────────

  async appendMessage(phone: string, message: ChatMessage): Promise<void> {
    await query(
      `INSERT INTO chat_histories (phone_number) VALUES ($1)
       ON CONFLICT (phone_number) DO UPDATE SET updated_at = NOW()`,
      [phone]
    );
    await query(
      `INSERT INTO chat_messages (id, phone_number, time_stamp, content, message_type, sender)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [uuidv4(), phone, message.time_stamp, message.content, message.message_type, message.sender]
    );
  }

  async getRecentMessages(phone: string, limit: number): Promise<ChatMessage[]> {
    const result = await query(
      `SELECT time_stamp, content, message_type, sender FROM (
         SELECT * FROM chat_messages WHERE phone_number = $1 ORDER BY seq DESC LIMIT $2
       ) recent ORDER BY seq ASC`,
      [phone, limit]
    );
    return result.rows.map((row) => chatMessageRowSchema.parse(row));
  }

  async getMessagePage(
    phone: string,
    offset: number,
    limit: number
  ): Promise<{ messages: ChatMessage[]; total: number } | null> {
    const exists = await query('SELECT 1 FROM chat_histories WHERE phone_number = $1', [phone]);
    if (exists.rows.length === 0) {
      return null;
    }

    const count = await query<{ total: string }>(
      'SELECT COUNT(*) AS total FROM chat_messages WHERE phone_number = $1',
      [phone]
    );
    const result = await query(
      `SELECT time_stamp, content, message_type, sender FROM chat_messages
       WHERE phone_number = $1 ORDER BY seq DESC OFFSET $2 LIMIT $3`,
      [phone, offset, limit]
    );

    return {
      messages: result.rows.map((row) => chatMessageRowSchema.parse(row)),
      total: parseInt(count.rows[0]?.total ?? '0', 10),
    };
  }

  // ── Referrals ──────────────────────────────────────────

  async getReferralByCode(code: string): Promise<ReferralRecord | null> {
    const result = await query('SELECT * FROM referrals WHERE referral_code = $1', [code]);
    return result.rows[0] ? parseReferral(result.rows[0], code) : null;
  }

  async getReferralByReferrer(phone: string): Promise<ReferralRecord | null> {
    const result = await query('SELECT * FROM referrals WHERE referrer_phone = $1', [phone]);
    return result.rows[0] ? parseReferral(result.rows[0], phone) : null;
  }

  async addReferral(record: ReferralRecord): Promise<ReferralRecord> {
    const result = await query(
      `INSERT INTO referrals (
         referral_code, referrer_id, referrer_phone, referrer_name, referrer_email,
         total_points, referred_users, campaign_id
       ) VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8)
       RETURNING *`,
      [
        record.referral_code,
        record.referrer_id,
        record.referrer_phone,
        record.referrer_name,
        record.referrer_email,
        record.total_points,
        JSON.stringify(record.referred_users),
        record.campaign_id,
      ]
    );

    logger.info('Referral record created', { code: record.referral_code, referrer: record.referrer_phone });
    return parseReferral(result.rows[0], record.referral_code);
  }

  async addReferredUser(code: string, user: ReferredUser): Promise<boolean> {
    // Conditional update: applies only while the phone is absent from the list.
    const result = await query(
      `UPDATE referrals
       SET referred_users = referred_users || jsonb_build_array($2::jsonb),
           total_points = total_points + 1,
           updated_at = NOW()
       WHERE referral_code = $1
         AND NOT referred_users @> jsonb_build_array(jsonb_build_object('phone_number', $3::text))`,
      [code, JSON.stringify(user), user.phone_number]
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ── Campaigns ──────────────────────────────────────────

  async isCampaignActive(code: string): Promise<boolean> {
    const result = await query(
      `SELECT 1 FROM campaigns
       WHERE campaign_code = $1
         AND status = 'active'
         AND (starts_at IS NULL OR starts_at <= NOW())
         AND (ends_at IS NULL OR ends_at > NOW())`,
      [code]
    );
    return result.rows.length > 0;
  }
}
