import { CustomerType } from './customer';

export interface AccountingProfile {
  customer_name: string | null;
  email: string | null;
  accounting_id: string;
  customer_type: CustomerType | null;
  company_name: string | null;
  is_active: boolean;
}

export interface StorefrontProfile {
  storefront_id: string;
  displayName: string | null;
  email: string | null;
  addressParts: Array<string | null>;
  totalSpent: number | null;
}

export interface AccountingProfileSource {
  lookupByPhone(phone: string): Promise<AccountingProfile | null>;
}

export interface StorefrontProfileSource {
  lookupByPhone(phone: string): Promise<StorefrontProfile | null>;
}

export interface KnowledgeSearch {
  search(query: string, topK?: number): Promise<string>;
}

export interface CampaignStatusSource {
  isActive(campaignCode: string): Promise<boolean>;
}
