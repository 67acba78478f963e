import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { ServiceError, toError } from '../utils/errors';
import { statusOf } from '../utils/http';
import { ChatTurn, LanguageModel, ToolDefinition, ToolSchema } from '../types/llm';

const MAX_RETRIES = 3;
const MAX_TOOL_TURNS = 5;

function toParams(blocks: Anthropic.Messages.ContentBlock[]): Anthropic.Messages.ContentBlockParam[] {
  const params: Anthropic.Messages.ContentBlockParam[] = [];
  for (const block of blocks) {
    if (block.type === 'text') {
      params.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      params.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input });
    }
  }
  return params;
}

export class AnthropicService implements LanguageModel {
  constructor(
    private client: Anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY }),
    private model: string = env.ANTHROPIC_MODEL
  ) {}

  async generateStructured(system: string, prompt: string, tool: ToolSchema): Promise<unknown> {
    const response = await this.create('generateStructured', {
      model: this.model,
      system,
      messages: [{ role: 'user', content: prompt }],
      tools: [tool],
      tool_choice: { type: 'tool', name: tool.name },
      temperature: 0,
      max_tokens: 512,
    });

    const block = response.content.find((b) => b.type === 'tool_use' && b.name === tool.name);
    if (!block || block.type !== 'tool_use') {
      throw new ServiceError('Anthropic', 'generateStructured', new Error(`No ${tool.name} call in response`), false);
    }

    logger.debug('Anthropic structured output', { tool: tool.name, tokens: response.usage });
    return block.input;
  }

  async generateWithTools(system: string, turns: ChatTurn[], tools: ToolDefinition[]): Promise<string> {
    const messages: Anthropic.Messages.MessageParam[] = turns.map((t) => ({ role: t.role, content: t.content }));
    const schemas: Anthropic.Messages.Tool[] = tools.map((t) => ({
      name: t.name,
      description: t.description,
      input_schema: t.input_schema,
    }));

    for (let turn = 1; turn <= MAX_TOOL_TURNS; turn++) {
      const response = await this.create('generateWithTools', {
        model: this.model,
        system,
        messages,
        ...(schemas.length > 0 ? { tools: schemas } : {}),
        temperature: 0.5,
        max_tokens: 600,
      });

      const toolCalls = response.content.filter(
        (b): b is Anthropic.Messages.ToolUseBlock => b.type === 'tool_use'
      );

      if (response.stop_reason !== 'tool_use' || toolCalls.length === 0) {
        return response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();
      }

      messages.push({ role: 'assistant', content: toParams(response.content) });

      const results: Anthropic.Messages.ToolResultBlockParam[] = [];
      for (const call of toolCalls) {
        results.push({ type: 'tool_result', tool_use_id: call.id, content: await this.runTool(tools, call) });
      }
      messages.push({ role: 'user', content: results });
    }

    throw new ServiceError('Anthropic', 'generateWithTools', new Error(`Exceeded ${MAX_TOOL_TURNS} tool turns`), false);
  }

  private async runTool(tools: ToolDefinition[], call: Anthropic.Messages.ToolUseBlock): Promise<string> {
    const tool = tools.find((t) => t.name === call.name);
    if (!tool) {
      return `Unknown tool: ${call.name}`;
    }

    try {
      const output = await tool.execute(call.input);
      logger.debug('Tool executed', { tool: call.name });
      return output;
    } catch (error) {
      logger.error('Tool execution failed', { tool: call.name, error: toError(error).message });
      return `Tool ${call.name} failed. Continue without it.`;
    }
  }

  private async create(
    operation: string,
    params: Anthropic.Messages.MessageCreateParamsNonStreaming
  ): Promise<Anthropic.Messages.Message> {
    let lastError: Error = new Error('no attempts made');

    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        return await this.client.messages.create(params);
      } catch (error) {
        lastError = toError(error);
        const status = statusOf(error);

        if (status === 429) {
          const delay = Math.pow(2, attempt) * 1000;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('Anthropic', operation, lastError, false);
        }

        logger.error('Anthropic error', { attempt, error: lastError.message });
      }
    }

    throw new ServiceError('Anthropic', operation, lastError);
  }
}
