export interface ToolSchema {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ToolDefinition extends ToolSchema {
  execute(input: unknown): Promise<string>;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface LanguageModel {
  /** One forced call of `tool`; resolves to the raw tool input for the caller to validate. */
  generateStructured(system: string, prompt: string, tool: ToolSchema): Promise<unknown>;
  /** Lets the model call `tools` until it answers in text. */
  generateWithTools(system: string, turns: ChatTurn[], tools: ToolDefinition[]): Promise<string>;
}
