import { ChatHistoryPage, ChatMessage, MessageSender } from '../types/conversation';
import { ChatHistoryStore } from '../types/store';
import { classifyContent } from '../utils/contentKind';
import { channelTimestamp } from '../utils/time';

export function buildMessage(content: string, sender: MessageSender, isVoice: boolean = false): ChatMessage {
  return {
    time_stamp: channelTimestamp(),
    content,
    message_type: classifyContent(content, isVoice),
    sender,
  };
}

export class ChatHistoryService {
  constructor(private store: ChatHistoryStore) {}

  append(phone: string, message: ChatMessage): Promise<void> {
    return this.store.appendMessage(phone, message);
  }

  recent(phone: string, limit: number): Promise<ChatMessage[]> {
    return this.store.getRecentMessages(phone, limit);
  }

  /** Newest-first page; `page` is 1-based. */
  async page(phone: string, page: number, pageSize: number): Promise<ChatHistoryPage | null> {
    const currentPage = Math.max(1, Math.floor(page));
    const perPage = Math.max(1, Math.floor(pageSize));
    const result = await this.store.getMessagePage(phone, (currentPage - 1) * perPage, perPage);
    if (!result) {
      return null;
    }

    const totalPages = Math.ceil(result.total / perPage);
    return {
      phone_number: phone,
      messages: result.messages,
      pagination: {
        current_page: currentPage,
        total_pages: totalPages,
        messages_per_page: perPage,
        has_next: currentPage < totalPages,
        has_previous: currentPage > 1,
      },
      total_messages: result.total,
    };
  }
}
