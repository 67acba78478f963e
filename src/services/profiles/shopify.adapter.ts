import { z } from 'zod';
import { StorefrontProfile, StorefrontProfileSource } from '../../types/profiles';
import { logger } from '../../utils/logger';
import { requestJson } from '../../utils/http';

export interface ShopifyConfig {
  storeDomain?: string;
  accessToken?: string;
  apiVersion?: string;
  retryDelayMs?: number;
}

const CUSTOMER_BY_PHONE = `
  query CustomerByPhone($query: String!) {
    customers(first: 1, query: $query) {
      edges {
        node {
          id
          displayName
          defaultEmailAddress { emailAddress }
          defaultAddress { address1 city province country zip }
          amountSpent { amount }
        }
      }
    }
  }
`;

const nullableString = z.string().nullable().optional();

const customerNodeSchema = z.object({
  id: z.string(),
  displayName: nullableString,
  defaultEmailAddress: z.object({ emailAddress: nullableString }).nullable().optional(),
  defaultAddress: z
    .object({
      address1: nullableString,
      city: nullableString,
      province: nullableString,
      country: nullableString,
      zip: nullableString,
    })
    .nullable()
    .optional(),
  amountSpent: z.object({ amount: z.coerce.number() }).nullable().optional(),
});

const responseSchema = z.object({
  data: z.object({
    customers: z.object({
      edges: z.array(z.object({ node: customerNodeSchema })),
    }),
  }),
});

export class ShopifyAdapter implements StorefrontProfileSource {
  constructor(private config: ShopifyConfig) {}

  async lookupByPhone(phone: string): Promise<StorefrontProfile | null> {
    if (!this.config.storeDomain || !this.config.accessToken) {
      logger.debug('Shopify not configured, skipping lookup', { phone });
      return null;
    }

    const url = `https://${this.config.storeDomain}/admin/api/${this.config.apiVersion ?? '2024-07'}/graphql.json`;
    const body = await requestJson('Shopify', url, {
      method: 'POST',
      headers: {
        'X-Shopify-Access-Token': this.config.accessToken,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ query: CUSTOMER_BY_PHONE, variables: { query: `phone:+${phone}` } }),
      retryDelayMs: this.config.retryDelayMs,
    });

    const node = responseSchema.parse(body).data.customers.edges[0]?.node;
    if (!node) {
      return null;
    }

    const addr = node.defaultAddress;
    return {
      storefront_id: node.id,
      displayName: node.displayName ?? null,
      email: node.defaultEmailAddress?.emailAddress ?? null,
      addressParts: addr ? [addr.address1, addr.city, addr.province, addr.country, addr.zip].map((p) => p ?? null) : [],
      totalSpent: node.amountSpent?.amount ?? null,
    };
  }
}
