import { PersonalInfo } from './customer';

export const INTENTS = ['greeting', 'direct_consumer_support', 'business_support'] as const;
export type Intent = (typeof INTENTS)[number];

export const HANDLER_NAMES = ['GreetingHandler', 'ConsumerSupportHandler', 'BusinessSupportHandler'] as const;
export type HandlerName = (typeof HANDLER_NAMES)[number];

export interface RoutingDecision {
  intent: Intent;
  handler: HandlerName;
  personal_info: PersonalInfo | null;
  reasoning: string | null;
}
