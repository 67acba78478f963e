import { ConversationContext } from '../../types/conversation';
import { LanguageModel, ToolDefinition } from '../../types/llm';
import { KnowledgeSearch } from '../../types/profiles';
import { CustomerStore } from '../../types/store';
import { LlmHandler } from './handler';
import { escalationTool, knowledgeTool } from './tools';

abstract class SupportHandler extends LlmHandler {
  constructor(
    llm: LanguageModel,
    private knowledge: KnowledgeSearch,
    private customers: CustomerStore
  ) {
    super(llm);
  }

  protected tools(context: ConversationContext): ToolDefinition[] {
    return [knowledgeTool(this.knowledge), escalationTool(this.customers, context)];
  }
}

export class ConsumerSupportHandler extends SupportHandler {
  readonly name = 'ConsumerSupportHandler' as const;
}

export class BusinessSupportHandler extends SupportHandler {
  readonly name = 'BusinessSupportHandler' as const;
}
