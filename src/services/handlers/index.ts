import { LanguageModel } from '../../types/llm';
import { KnowledgeSearch } from '../../types/profiles';
import { CustomerStore } from '../../types/store';
import { HandlerRegistry } from './handler';
import { GreetingHandler } from './greeting.handler';
import { BusinessSupportHandler, ConsumerSupportHandler } from './support.handler';

export function createHandlerRegistry(
  llm: LanguageModel,
  knowledge: KnowledgeSearch,
  customers: CustomerStore
): HandlerRegistry {
  return {
    GreetingHandler: new GreetingHandler(llm),
    ConsumerSupportHandler: new ConsumerSupportHandler(llm, knowledge, customers),
    BusinessSupportHandler: new BusinessSupportHandler(llm, knowledge, customers),
  };
}

export type { ConversationHandler, HandlerRegistry } from './handler';
