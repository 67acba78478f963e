import { env } from './config/env';
import { checkDatabaseHealth } from './config/database';
import { queueNotificationDispatcher, checkQueueHealth } from './config/queue';
import { ChannelAdapter } from './types/channel';
import { CustomerStore } from './types/store';
import { AnalyticsService } from './services/analytics.service';
import { AnthropicService } from './services/anthropic.service';
import { BroadcastService } from './services/broadcast.service';
import { CampaignService } from './services/campaign.service';
import { ChannelFactory } from './services/channel/channel.factory';
import { ChatHistoryService } from './services/chat-history.service';
import { ConversationService } from './services/conversation.service';
import { DatabaseService } from './services/database.service';
import { createHandlerRegistry } from './services/handlers';
import { IdentityService } from './services/identity.service';
import { IntentRouterService } from './services/intent-router.service';
import { KnowledgeService } from './services/knowledge.service';
import { OpenAIService } from './services/openai.service';
import { QuickBooksAdapter } from './services/profiles/quickbooks.adapter';
import { ShopifyAdapter } from './services/profiles/shopify.adapter';
import { ReferralService } from './services/referral.service';

export interface HealthStatus {
  status: string;
  error?: string;
}

export interface AppServices {
  conversation: ConversationService;
  customers: CustomerStore;
  analytics: AnalyticsService;
  channel: ChannelAdapter;
  broadcast: BroadcastService;
  health: () => Promise<Record<string, HealthStatus>>;
}

export function buildServices(): AppServices {
  const db = new DatabaseService();
  const openai = new OpenAIService();
  const llm = new AnthropicService();
  const channel = ChannelFactory.fromEnv(openai);
  const broadcast = new BroadcastService();

  const identity = new IdentityService(
    db,
    new QuickBooksAdapter({
      baseUrl: env.QUICKBOOKS_BASE_URL,
      realmId: env.QUICKBOOKS_REALM_ID,
      accessToken: env.QUICKBOOKS_ACCESS_TOKEN,
    }),
    new ShopifyAdapter({
      storeDomain: env.SHOPIFY_STORE_DOMAIN,
      accessToken: env.SHOPIFY_ACCESS_TOKEN,
    })
  );

  const referrals = new ReferralService(db, new CampaignService(db), queueNotificationDispatcher);
  const knowledge = new KnowledgeService(openai);

  const conversation = new ConversationService({
    channel,
    identity,
    referrals,
    router: new IntentRouterService(llm),
    handlers: createHandlerRegistry(llm, knowledge, db),
    history: new ChatHistoryService(db),
    broadcast,
    customers: db,
  });

  return {
    conversation,
    customers: db,
    analytics: new AnalyticsService(db),
    channel,
    broadcast,
    health: async () => {
      const [database, queue] = await Promise.all([checkDatabaseHealth(), checkQueueHealth()]);
      return { database, queue };
    },
  };
}
