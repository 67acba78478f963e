import { CustomerProfile } from './customer';

export type ContentKind = 'text' | 'image' | 'audio' | 'document';

export type MessageSender = 'customer' | 'agent' | 'representative';

export interface ChatMessage {
  time_stamp: string;
  content: string;
  message_type: ContentKind;
  sender: MessageSender;
}

export interface PaginationInfo {
  current_page: number;
  total_pages: number;
  messages_per_page: number;
  has_next: boolean;
  has_previous: boolean;
}

export interface ChatHistoryPage {
  phone_number: string;
  messages: ChatMessage[];
  pagination: PaginationInfo;
  total_messages: number;
}

/** Everything a handler or the router may read about the conversation in progress. */
export interface ConversationContext {
  customer: CustomerProfile;
  history: ChatMessage[];
  formattedCustomer: string;
  formattedHistory: string;
}

export type ProcessAction = 'responded' | 'referral' | 'escalated_skip' | 'ignored' | 'dropped';

export interface ProcessOutcome {
  action_taken: ProcessAction;
  phone_number: string | null;
  response?: string;
  handler?: string;
  error?: string;
}
