import { ChatMessage } from '../types/conversation';
import { CustomerProfile } from '../types/customer';
import { HandlerName } from '../types/routing';

export const INTEREST_GROUPS = [
  'Bluetooth Headphones',
  'Bluetooth Speakers',
  'Wireless Earbuds',
  'Gaming Chairs',
  'Smart Watches',
  'Enclosure',
  'Power Supply',
  'Office Mouse',
  'CPU Coolers',
  'Computer Accessories',
  'Power Banks',
  'Gaming Mouse',
  'Gaming Monitors',
  'Combo',
  'Core',
] as const;

const WHATSAPP_RULES = `FORMATTING:
- This is WhatsApp: short paragraphs, no markdown headings or tables
- *bold* and _italic_ use WhatsApp syntax
- Never invent order numbers, prices or stock levels`;

export const ROUTER_PROMPT = `You are a conversation intent router. Read the most recent customer message and the customer context, then call the route_conversation tool exactly once.

INTENTS:
- greeting: social pleasantries or small talk with no request
- direct_consumer_support: an individual asking about products, orders, delivery, returns, refunds, accounts or recommendations
- business_support: bulk orders, wholesale pricing, partnerships, contracts or vendor relationships

EXTRACTION:
- Only fill personal fields the customer has actually stated, or that appear in the customer context
- Leave a field out when it is not known
- interest_groups may only contain these values: ${INTEREST_GROUPS.join(', ')}
- reasoning is at most 25 words`;

const HANDLER_PROMPTS: Record<HandlerName, string> = {
  GreetingHandler: `You are the friendly front desk of a consumer electronics store on WhatsApp. Reply warmly in one or two sentences, greet the customer by name when you know it, and invite them to say what they need.`,
  ConsumerSupportHandler: `You are a customer support agent for a consumer electronics store on WhatsApp. Help individual shoppers with products, orders, delivery, returns and recommendations.

RULES:
- Use search_company_knowledge before answering questions about policies or products
- If the knowledge base has nothing relevant, say so and offer a human
- Call escalate_to_human when the customer asks for a person, is upset, or needs something you cannot do
- Ask one question at a time`,
  BusinessSupportHandler: `You are an account manager for a consumer electronics distributor on WhatsApp, serving business customers.

RULES:
- Use search_company_knowledge for wholesale terms, bulk pricing policy and product specifications
- Confirm quantities and delivery locations before quoting anything
- Call escalate_to_human for contracts, custom pricing or anything needing approval
- Keep a professional, concise tone`,
};

export function buildHandlerPrompt(handler: HandlerName, customer: string, history: string): string {
  return [
    HANDLER_PROMPTS[handler],
    WHATSAPP_RULES,
    `CUSTOMER CONTEXT:\n${customer}`,
    `CHAT HISTORY:\n${history}`,
  ].join('\n\n');
}

export function formatCustomerContext(customer: CustomerProfile): string {
  const lines = [
    `phone_number: ${customer.phone_number}`,
    `customer_name: ${customer.customer_name ?? 'unknown'}`,
    `email: ${customer.email ?? 'unknown'}`,
    `address: ${customer.address ?? 'unknown'}`,
    `customer_type: ${customer.customer_type ?? 'consumer'}`,
  ];

  if (customer.company_name) lines.push(`company_name: ${customer.company_name}`);
  if (customer.total_spend > 0) lines.push(`total_spend: ${customer.total_spend.toFixed(2)}`);
  if (customer.socials.length > 0) lines.push(`socials: ${customer.socials.join(', ')}`);
  if (customer.interest_groups.length > 0) lines.push(`interest_groups: ${customer.interest_groups.join(', ')}`);
  if (customer.tags.length > 0) lines.push(`tags: ${customer.tags.join(', ')}`);

  return lines.join('\n');
}

export function formatHistory(messages: ChatMessage[]): string {
  if (messages.length === 0) {
    return '(no previous messages)';
  }
  return messages.map((m) => `[${m.time_stamp}] ${m.sender}: ${m.content}`).join('\n');
}

export function buildInvitationText(botNumber: string, brandName: string, tag: string): string {
  const shareText = `Hi! I'd like to chat with ${brandName}. ${tag}`;
  const link = `https://wa.me/${botNumber}/?text=${encodeURIComponent(shareText)}`;
  return `Thanks for chatting with us! 🎉\n\nShare this link with friends. Every friend who messages us through it earns you a referral point:\n${link}`;
}

export const REFERRAL_CREDITED_TEXT = '✅ Your referral count has been incremented!';

export const INVITE_UNAVAILABLE_TEXT =
  "Sorry, we couldn't create your referral link right now. Please try again later.";
