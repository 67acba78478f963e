import { CustomerStats, MessageStats, SpendLeader } from './analytics';
import { CustomerProfile, CustomerType, CustomerUpdate, NewCustomer } from './customer';
import { ChatMessage } from './conversation';
import { ReferralRecord, ReferredUser } from './referral';

export interface CustomerListFilter {
  limit: number;
  customerType?: CustomerType;
  escalated?: boolean;
}

/** A bounded slice plus the number of rows that matched overall. */
export interface CustomerMatches {
  customers: CustomerProfile[];
  total: number;
}

export interface CustomerStore {
  getCustomerByPhone(phone: string): Promise<CustomerProfile | null>;
  createCustomer(customer: NewCustomer): Promise<CustomerProfile>;
  updateCustomer(phone: string, updates: CustomerUpdate): Promise<CustomerProfile | null>;
  updateEscalationStatus(phone: string, status: boolean): Promise<boolean>;
  listCustomers(filter: CustomerListFilter): Promise<CustomerProfile[]>;
  /** Case-insensitive substring match on name, phone, company and email. */
  searchCustomers(term: string, limit: number): Promise<CustomerMatches>;
  /** Customers with `total_spend >= minSpend`, highest spend first. */
  listHighValueCustomers(minSpend: number, limit: number): Promise<CustomerMatches>;
}

export interface ChatHistoryStore {
  appendMessage(phone: string, message: ChatMessage): Promise<void>;
  /** Newest `limit` messages, returned oldest-first. */
  getRecentMessages(phone: string, limit: number): Promise<ChatMessage[]>;
  /** Newest-first slice, or null when the phone has no history log. */
  getMessagePage(phone: string, offset: number, limit: number): Promise<{ messages: ChatMessage[]; total: number } | null>;
}

export interface ReferralStore {
  getReferralByCode(code: string): Promise<ReferralRecord | null>;
  getReferralByReferrer(phone: string): Promise<ReferralRecord | null>;
  addReferral(record: ReferralRecord): Promise<ReferralRecord>;
  /** Appends the user and adds one point unless the phone is already listed. Returns whether it applied. */
  addReferredUser(code: string, user: ReferredUser): Promise<boolean>;
}

export interface CampaignStore {
  isCampaignActive(code: string): Promise<boolean>;
}

export interface AnalyticsStore {
  getCustomerStats(highValueThreshold: number): Promise<CustomerStats>;
  getTopCustomersBySpend(limit: number): Promise<SpendLeader[]>;
  getMessageStats(): Promise<MessageStats>;
}
