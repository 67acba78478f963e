import { ChatMessage } from '../types/conversation';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type MessageListener = (message: ChatMessage) => void;

/**
 * Fans new chat messages out to live listeners per phone number. Delivery is
 * synchronous, so per-phone order matches publish order.
 */
export class BroadcastService {
  private listeners = new Map<string, Set<MessageListener>>();

  subscribe(phone: string, listener: MessageListener): () => void {
    let set = this.listeners.get(phone);
    if (!set) {
      set = new Set();
      this.listeners.set(phone, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(phone);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(phone);
      }
    };
  }

  publish(phone: string, message: ChatMessage): void {
    const set = this.listeners.get(phone);
    if (!set) return;

    for (const listener of [...set]) {
      try {
        listener(message);
      } catch (error) {
        logger.warn('Broadcast listener failed', { phone, error: errorMessage(error) });
      }
    }
  }

  subscriberCount(phone: string): number {
    return this.listeners.get(phone)?.size ?? 0;
  }
}
