import { z } from 'zod';
import { CustomerType, PersonalInfo } from '../types/customer';
import { ConversationContext } from '../types/conversation';
import { LanguageModel, ToolSchema } from '../types/llm';
import { HandlerName, Intent, INTENTS, RoutingDecision } from '../types/routing';
import { logger } from '../utils/logger';
import { UnrecognizedRoutingTargetError } from '../utils/errors';
import { INTEREST_GROUPS, ROUTER_PROMPT } from '../utils/prompts';
import { compactProfileUpdates, hasUpdates } from '../utils/profileMerge';

const ROUTE_TOOL: ToolSchema = {
  name: 'route_conversation',
  description: 'Record the intent of the latest customer message and any personal details it reveals.',
  input_schema: {
    type: 'object',
    properties: {
      intent: { type: 'string', enum: [...INTENTS] },
      reasoning: { type: 'string' },
      name: { type: 'string' },
      email: { type: 'string' },
      address: { type: 'string' },
      socials: { type: 'array', items: { type: 'string' } },
      interest_groups: { type: 'array', items: { type: 'string', enum: [...INTEREST_GROUPS] } },
    },
    required: ['intent'],
  },
};

const optionalText = z.string().nullable().optional();

const routeOutputSchema = z.object({
  intent: z.string(),
  reasoning: optionalText,
  name: optionalText,
  email: optionalText,
  address: optionalText,
  socials: z.array(z.string()).nullable().optional(),
  interest_groups: z.array(z.string()).nullable().optional(),
});

const intentSchema = z.enum(INTENTS);

const ALLOWED_INTERESTS: ReadonlySet<string> = new Set(INTEREST_GROUPS);

/** The customer's account type beats whichever support intent the model picked. */
export function selectHandler(intent: Intent, customerType: CustomerType | null): HandlerName {
  if (intent === 'greeting') {
    return 'GreetingHandler';
  }
  return customerType === 'business' ? 'BusinessSupportHandler' : 'ConsumerSupportHandler';
}

function decodeIntent(raw: string): Intent {
  const parsed = intentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnrecognizedRoutingTargetError(raw);
  }
  return parsed.data;
}

function toPersonalInfo(output: z.infer<typeof routeOutputSchema>): PersonalInfo | null {
  const interests = (output.interest_groups ?? []).filter((g) => ALLOWED_INTERESTS.has(g));
  const socials = (output.socials ?? []).map((s) => s.trim()).filter((s) => s.length > 0);

  const info = compactProfileUpdates({
    customer_name: output.name?.trim(),
    email: output.email?.trim(),
    address: output.address?.trim(),
    socials,
    interest_groups: interests,
  });

  return hasUpdates(info) ? info : null;
}

export class IntentRouterService {
  constructor(private llm: LanguageModel) {}

  async classify(message: string, context: ConversationContext): Promise<RoutingDecision> {
    const prompt = [
      `CUSTOMER CONTEXT:\n${context.formattedCustomer}`,
      `CHAT HISTORY:\n${context.formattedHistory}`,
      `LATEST MESSAGE:\n${message}`,
    ].join('\n\n');

    const raw = await this.llm.generateStructured(ROUTER_PROMPT, prompt, ROUTE_TOOL);
    const output = routeOutputSchema.parse(raw);
    const intent = decodeIntent(output.intent);

    const decision: RoutingDecision = {
      intent,
      handler: selectHandler(intent, context.customer.customer_type),
      personal_info: toPersonalInfo(output),
      reasoning: output.reasoning?.trim() || null,
    };

    logger.info('Message routed', {
      phone: context.customer.phone_number,
      intent: decision.intent,
      handler: decision.handler,
    });
    return decision;
  }
}
