import { z } from 'zod';
import { ConversationContext } from '../../types/conversation';
import { ToolDefinition } from '../../types/llm';
import { KnowledgeSearch } from '../../types/profiles';
import { CustomerStore } from '../../types/store';
import { logger } from '../../utils/logger';

const searchInput = z.object({ query: z.string().min(1), top_k: z.number().int().positive().max(10).optional() });
const escalateInput = z.object({ reason: z.string().optional() });

export function knowledgeTool(knowledge: KnowledgeSearch): ToolDefinition {
  return {
    name: 'search_company_knowledge',
    description: 'Search the company knowledge base for policies, product details and FAQs.',
    input_schema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to look up' },
        top_k: { type: 'integer', description: 'How many passages to return (default 5)' },
      },
      required: ['query'],
    },
    async execute(input) {
      const { query, top_k } = searchInput.parse(input);
      return knowledge.search(query, top_k);
    },
  };
}

export function escalationTool(customers: CustomerStore, context: ConversationContext): ToolDefinition {
  return {
    name: 'escalate_to_human',
    description: 'Hand the conversation to a human representative. The assistant stops replying afterwards.',
    input_schema: {
      type: 'object',
      properties: {
        reason: { type: 'string', description: 'Why a human is needed' },
      },
    },
    async execute(input) {
      const { reason } = escalateInput.parse(input);
      const phone = context.customer.phone_number;
      const updated = await customers.updateEscalationStatus(phone, true);
      logger.info('Conversation escalated to human', { phone, reason, updated });
      return updated
        ? 'Escalated. Tell the customer a team member will reply shortly.'
        : 'Escalation failed. Apologise and ask the customer to try again later.';
    },
  };
}
