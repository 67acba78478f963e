export type CustomerType = 'business' | 'consumer';

export const DEFAULT_CUSTOMER_TYPE: CustomerType = 'consumer';

export interface CustomerProfile {
  phone_number: string;
  customer_name: string | null;
  email: string | null;
  address: string | null;
  customer_type: CustomerType | null;
  accounting_id: string | null;
  storefront_id: string | null;
  company_name: string | null;
  total_spend: number;
  is_active: boolean;
  escalation_status: boolean;
  tags: string[];
  socials: string[];
  interest_groups: string[];
  created_at?: string;
  updated_at?: string;
}

export type NewCustomer = Pick<CustomerProfile, 'phone_number'> &
  Partial<Omit<CustomerProfile, 'phone_number' | 'created_at' | 'updated_at'>>;

/** Fields that may be written after creation. The phone number is never among them. */
export type CustomerUpdate = Partial<
  Omit<CustomerProfile, 'phone_number' | 'escalation_status' | 'created_at' | 'updated_at'>
>;

export interface PersonalInfo {
  customer_name?: string | null;
  email?: string | null;
  address?: string | null;
  socials?: string[] | null;
  interest_groups?: string[] | null;
}
