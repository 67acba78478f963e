import { ContentKind } from './conversation';
import { CustomerType } from './customer';

export interface CustomerStats {
  total: number;
  active: number;
  escalated: number;
  business: number;
  consumer: number;
  escalated_business: number;
  escalated_consumer: number;
  total_spend: number;
  high_value: number;
}

export interface SpendLeader {
  phone_number: string;
  customer_name: string | null;
  customer_type: CustomerType | null;
  total_spend: number;
}

export interface MessageStats {
  total_conversations: number;
  total_messages: number;
  message_types: Record<ContentKind, number>;
}
