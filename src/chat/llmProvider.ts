export interface LLMToolCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export type LLMMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content?: string; toolCalls?: LLMToolCall[] }
  | { role: 'tool'; name: string; toolCallId?: string; content: string };

export interface LLMTool {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required: string[];
  };
}

export interface LLMResponse {
  content?: string;
  toolCalls?: LLMToolCall[];
}

export interface ChatOptions {
  /** Overrides the provider's default model for this call. */
  model?: string;
  logContext?: Record<string, unknown>;
}

export interface LLMProvider {
  name: string;
  /** Model used when a call does not name one. */
  model: string;
  chat(messages: LLMMessage[], tools: LLMTool[], options?: ChatOptions): Promise<LLMResponse>;
  listModels(): Promise<string[]>;
}
