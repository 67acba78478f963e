import { ConversationContext } from '../../types/conversation';
import { ChatTurn, LanguageModel, ToolDefinition } from '../../types/llm';
import { HandlerName } from '../../types/routing';
import { buildHandlerPrompt } from '../../utils/prompts';

export interface ConversationHandler {
  readonly name: HandlerName;
  respond(message: string, context: ConversationContext): Promise<string>;
}

export type HandlerRegistry = Record<HandlerName, ConversationHandler>;

/** A handler that answers with one model conversation, optionally using tools. */
export abstract class LlmHandler implements ConversationHandler {
  abstract readonly name: HandlerName;

  constructor(protected llm: LanguageModel) {}

  protected tools(_context: ConversationContext): ToolDefinition[] {
    return [];
  }

  async respond(message: string, context: ConversationContext): Promise<string> {
    const system = buildHandlerPrompt(this.name, context.formattedCustomer, context.formattedHistory);
    const turns: ChatTurn[] = [{ role: 'user', content: message }];
    return this.llm.generateWithTools(system, turns, this.tools(context));
  }
}
