import { env } from '../config/env';
import { ChannelAdapter, MediaKind } from '../types/channel';
import {
  ChatHistoryPage,
  ChatMessage,
  ConversationContext,
  MessageSender,
  ProcessOutcome,
} from '../types/conversation';
import { CustomerProfile, PersonalInfo } from '../types/customer';
import { CustomerStore } from '../types/store';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { extractReferralCodes } from '../utils/referralCodes';
import { KeyedQueue } from '../utils/keyedQueue';
import { hasUpdates, personalInfoToUpdate } from '../utils/profileMerge';
import { formatCustomerContext, formatHistory } from '../utils/prompts';
import { BroadcastService } from './broadcast.service';
import { buildMessage, ChatHistoryService } from './chat-history.service';
import { IdentityService } from './identity.service';
import { IntentRouterService } from './intent-router.service';
import { ReferralService } from './referral.service';
import { HandlerRegistry } from './handlers';

export interface ConversationDeps {
  channel: ChannelAdapter;
  identity: IdentityService;
  referrals: ReferralService;
  router: IntentRouterService;
  handlers: HandlerRegistry;
  history: ChatHistoryService;
  broadcast: BroadcastService;
  customers: CustomerStore;
  historyWindow?: number;
}

interface Reply {
  text: string;
  action: 'responded' | 'referral';
  handler?: string;
}

/**
 * Drives one inbound message from webhook payload to sent reply. Messages from the
 * same address are processed strictly one after another.
 */
export class ConversationService {
  private queue = new KeyedQueue();
  private historyWindow: number;

  constructor(private deps: ConversationDeps) {
    this.historyWindow = deps.historyWindow ?? env.HISTORY_WINDOW;
  }

  /**
   * Never throws: failures are logged and the message is dropped without a reply.
   * The per-address slot is taken before the payload is normalised.
   */
  async processInboundMessage(payload: unknown, isVoice: boolean = false): Promise<ProcessOutcome> {
    const phone = this.deps.channel.senderOf(payload);
    if (!phone) {
      logger.debug('Payload carried no message, ignoring');
      return { action_taken: 'ignored', phone_number: null };
    }

    try {
      return await this.queue.run<ProcessOutcome>(phone, async () => {
        const inbound = await this.deps.channel.receive(payload, isVoice);
        if (!inbound) {
          logger.debug('Payload carried no message, ignoring', { phone });
          return { action_taken: 'ignored', phone_number: null };
        }
        return this.handle(inbound.sender, inbound.content, isVoice);
      });
    } catch (error) {
      logger.error('Inbound message dropped', { phone, error: errorMessage(error) });
      return { action_taken: 'dropped', phone_number: phone, error: errorMessage(error) };
    }
  }

  private async handle(phone: string, content: string, isVoice: boolean): Promise<ProcessOutcome> {
    await this.record(phone, buildMessage(content, 'customer', isVoice));

    const customer = await this.deps.identity.resolve(phone);
    if (customer.escalation_status) {
      // Known gap: the dashboard is not told that a reply was skipped.
      logger.info('Customer escalated, skipping automated reply', { phone });
      return { action_taken: 'escalated_skip', phone_number: phone };
    }

    const recent = await this.deps.history.recent(phone, this.historyWindow);
    const context = this.buildContext(customer, recent);
    const reply = await this.reply(phone, content, context);

    await this.record(phone, buildMessage(reply.text, 'agent'));
    await this.deps.channel.sendText(phone, reply.text);

    logger.info('Reply sent', { phone, action: reply.action, handler: reply.handler });
    return {
      action_taken: reply.action,
      phone_number: phone,
      response: reply.text,
      handler: reply.handler,
    };
  }

  private async reply(phone: string, content: string, context: ConversationContext): Promise<Reply> {
    if (extractReferralCodes(content).referralCode) {
      const text = await this.deps.referrals.referralWorkflow(content, phone, context.customer);
      return { text, action: 'referral' };
    }

    const decision = await this.deps.router.classify(content, context);
    if (decision.personal_info) {
      await this.mergePersonalInfo(phone, decision.personal_info);
    }

    const handler = this.deps.handlers[decision.handler];
    const text = await handler.respond(content, context);
    return { text, action: 'responded', handler: handler.name };
  }

  private async mergePersonalInfo(phone: string, info: PersonalInfo): Promise<void> {
    const updates = personalInfoToUpdate(info);
    if (!hasUpdates(updates)) return;

    try {
      await this.deps.customers.updateCustomer(phone, updates);
      logger.info('Customer profile updated from conversation', { phone, fields: Object.keys(updates) });
    } catch (error) {
      logger.error('Failed to store personal info', { phone, error: errorMessage(error) });
    }
  }

  private buildContext(customer: CustomerProfile, history: ChatMessage[]): ConversationContext {
    return {
      customer,
      history,
      formattedCustomer: formatCustomerContext(customer),
      formattedHistory: formatHistory(history),
    };
  }

  /** Appends to history then broadcasts. A failed append is logged and the message is still broadcast. */
  private async record(phone: string, message: ChatMessage): Promise<void> {
    try {
      await this.deps.history.append(phone, message);
    } catch (error) {
      logger.error('Failed to append chat history', { phone, sender: message.sender, error: errorMessage(error) });
    }
    this.deps.broadcast.publish(phone, message);
  }

  // ── Dashboard surface ──────────────────────────────────

  getRecentHistory(phone: string, page: number = 1, pageSize: number = 20): Promise<ChatHistoryPage | null> {
    return this.deps.history.page(phone, page, pageSize);
  }

  sendOutboundMessage(phone: string, content: string, sender: MessageSender = 'representative'): Promise<ChatMessage> {
    return this.queue.run(phone, async () => {
      await this.deps.channel.sendText(phone, content);
      const message = buildMessage(content, sender);
      await this.record(phone, message);
      return message;
    });
  }

  sendOutboundMedia(
    phone: string,
    kind: MediaKind,
    url: string,
    caption?: string,
    sender: MessageSender = 'representative'
  ): Promise<ChatMessage> {
    return this.queue.run(phone, async () => {
      await this.deps.channel.sendMedia(phone, kind, url, caption);
      const message = buildMessage(mediaMarkdown(kind, url, caption), sender);
      await this.record(phone, message);
      return message;
    });
  }

  generateReferralInvite(phone: string): Promise<string> {
    return this.queue.run(phone, async () => {
      const customer = await this.deps.identity.resolve(phone);
      return this.deps.referrals.generateInvite(phone, customer);
    });
  }
}

/** Link text may not carry markdown delimiters or the voice-note label. */
function linkText(caption: string | undefined, fallback: string): string {
  const text = (caption ?? '').replace(/[[\]()]/g, '').replace(/Audio Message/gi, '').replace(/\s+/g, ' ').trim();
  return text || fallback;
}

export function mediaMarkdown(kind: MediaKind, url: string, caption?: string): string {
  switch (kind) {
    case 'image':
      return `![${linkText(caption, 'Image')}](${url})`;
    case 'audio':
      return `[Audio Message](${url})`;
    case 'document':
      return `[${linkText(caption, 'Document')}](${url})`;
  }
}
