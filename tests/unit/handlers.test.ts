import { createHandlerRegistry } from '../../src/services/handlers';
import { escalationTool, knowledgeTool } from '../../src/services/handlers/tools';
import { ConversationContext } from '../../src/types/conversation';
import { InMemoryStore } from '../helpers/memoryStore';
import { makeCustomer, ScriptedModel } from '../helpers/fakes';

const PHONE = '15550001234';

function context(): ConversationContext {
  return {
    customer: makeCustomer(),
    history: [],
    formattedCustomer: 'customer_name: Ana Lopez',
    formattedHistory: '(no previous messages)',
  };
}

describe('handler tools', () => {
  it('should escalate the current customer', async () => {
    const store = new InMemoryStore();
    store.customers.set(PHONE, makeCustomer());

    const result = await escalationTool(store, context()).execute({ reason: 'asked for a manager' });

    expect(result).toBe('Escalated. Tell the customer a team member will reply shortly.');
    expect(store.customers.get(PHONE)?.escalation_status).toBe(true);
  });

  it('should report an escalation that found no customer', async () => {
    const result = await escalationTool(new InMemoryStore(), context()).execute({});
    expect(result).toBe('Escalation failed. Apologise and ask the customer to try again later.');
  });

  it('should pass the query and result count to the knowledge base', async () => {
    const search = jest.fn().mockResolvedValue('🔹 Warranty is one year. (score: 0.91)');

    const result = await knowledgeTool({ search }).execute({ query: 'warranty', top_k: 2 });

    expect(search).toHaveBeenCalledWith('warranty', 2);
    expect(result).toBe('🔹 Warranty is one year. (score: 0.91)');
  });

  it('should reject a knowledge call without a query', async () => {
    await expect(knowledgeTool({ search: jest.fn() }).execute({})).rejects.toThrow();
  });
});

describe('handler registry', () => {
  it('should give only support handlers tools', async () => {
    const model = new ScriptedModel();
    model.replies.push('Hi Ana!', 'Let me help.');
    const handlers = createHandlerRegistry(model, { search: jest.fn() }, new InMemoryStore());

    expect(await handlers.GreetingHandler.respond('Hi', context())).toBe('Hi Ana!');
    expect(await handlers.BusinessSupportHandler.respond('Bulk order?', context())).toBe('Let me help.');

    expect(model.toolCalls[0].tools).toEqual([]);
    expect(model.toolCalls[1].tools.map((t) => t.name)).toEqual(['search_company_knowledge', 'escalate_to_human']);
    expect(model.toolCalls[1].turns).toEqual([{ role: 'user', content: 'Bulk order?' }]);
  });
});
