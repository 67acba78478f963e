import { z } from 'zod';
import { AccountingProfile, AccountingProfileSource } from '../../types/profiles';
import { logger } from '../../utils/logger';
import { requestJson, RequestOptions } from '../../utils/http';

export interface QuickBooksConfig {
  baseUrl: string;
  realmId?: string;
  accessToken?: string;
  retryDelayMs?: number;
}

const qbCustomerSchema = z.object({
  Id: z.string(),
  DisplayName: z.string().optional(),
  CompanyName: z.string().optional(),
  PrimaryEmailAddr: z.object({ Address: z.string().optional() }).optional(),
  Active: z.boolean().optional(),
});

const queryResponseSchema = z.object({
  QueryResponse: z.object({
    Customer: z.array(qbCustomerSchema).optional(),
  }),
});

export class QuickBooksAdapter implements AccountingProfileSource {
  constructor(private config: QuickBooksConfig) {}

  async lookupByPhone(phone: string): Promise<AccountingProfile | null> {
    if (!this.config.realmId || !this.config.accessToken) {
      logger.debug('QuickBooks not configured, skipping lookup', { phone });
      return null;
    }

    const statement = `SELECT * FROM Customer WHERE PrimaryPhone = '${phone.replace(/\D/g, '')}'`;
    const url = `${this.config.baseUrl}/v3/company/${this.config.realmId}/query?query=${encodeURIComponent(statement)}&minorversion=65`;
    const options: RequestOptions = {
      headers: {
        Authorization: `Bearer ${this.config.accessToken}`,
        Accept: 'application/json',
      },
      retryDelayMs: this.config.retryDelayMs,
    };

    const body = queryResponseSchema.parse(await requestJson('QuickBooks', url, options));
    const customer = body.QueryResponse.Customer?.[0];
    if (!customer) {
      return null;
    }

    const companyName = customer.CompanyName?.trim() || null;
    return {
      accounting_id: customer.Id,
      customer_name: customer.DisplayName?.trim() || null,
      email: customer.PrimaryEmailAddr?.Address?.trim() || null,
      company_name: companyName,
      customer_type: companyName ? 'business' : 'consumer',
      is_active: customer.Active ?? true,
    };
  }
}
