import OpenAI from 'openai';
import type { LLMProvider, LLMMessage, LLMTool, LLMResponse, LLMToolCall, ChatOptions } from './llmProvider.js';
import { createLogger } from '../logger.js';

const log = createLogger('LLM');

interface OllamaConfig {
  baseUrl: string;
  model: string;
  /** Ollama ignores the key, but the SDK refuses to start without one. */
  apiKey?: string;
  timeoutMs?: number;
}

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.ChatCompletionTool;

/** The slice of the OpenAI SDK client this provider calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
  models: {
    list(): AsyncIterable<{ id: string }>;
  };
}

function toOpenAIMessages(messages: LLMMessage[]): OpenAIMessage[] {
  return messages.map((msg): OpenAIMessage => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'tool':
        return { role: 'tool', content: msg.content, tool_call_id: msg.toolCallId || msg.name };
      case 'assistant':
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id || tc.name,
              type: 'function' as const,
              function: { name: tc.name, arguments: JSON.stringify(tc.args) },
            })),
          };
        }
        return { role: 'assistant', content: msg.content || '' };
    }
  });
}

function toOpenAITools(tools: LLMTool[]): OpenAITool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }));
}

/**
 * Models sometimes emit arguments that are not a JSON object. Those become an
 * empty mapping so the executor reports the missing fields back to the model.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    log.warn({ action: 'llm.tool_args.invalid', raw, error: String(error) }, 'Tool arguments are not valid JSON');
    return {};
  }
  log.warn({ action: 'llm.tool_args.invalid', raw }, 'Tool arguments are not a JSON object');
  return {};
}

export class OllamaProvider implements LLMProvider {
  name = 'ollama';
  readonly model: string;
  private client: ChatCompletionClient;

  constructor(config: OllamaConfig, client?: ChatCompletionClient) {
    this.client = client ?? new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey || 'ollama',
      timeout: config.timeoutMs,
    });
    this.model = config.model;
  }

  async chat(messages: LLMMessage[], tools: LLMTool[], options?: ChatOptions): Promise<LLMResponse> {
    const model = options?.model || this.model;
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: toOpenAIMessages(messages),
    };

    if (tools.length > 0) {
      params.tools = toOpenAITools(tools);
    }

    log.debug({ action: 'llm.call.started', model, messages: messages.length, ...options?.logContext }, 'LLM call started');

    let data: OpenAI.Chat.ChatCompletion;
    try {
      data = await this.client.chat.completions.create(params);
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIError) {
        throw new Error(`Ollama API error (${err.status}): ${err.message}`);
      }
      throw err;
    }

    if (!data.choices || data.choices.length === 0) {
      throw new Error('No choices returned from Ollama');
    }

    const choice = data.choices[0];
    const result: LLMResponse = {};

    if (choice.message.tool_calls && choice.message.tool_calls.length > 0) {
      result.toolCalls = choice.message.tool_calls
        .filter((tc) => tc.type === 'function')
        .map((tc): LLMToolCall => ({
          id: tc.id,
          name: tc.function.name,
          args: parseToolArguments(tc.function.arguments),
        }));
    }

    if (choice.message.content) {
      result.content = choice.message.content;
    }

    log.debug(
      { action: 'llm.call.succeeded', model, toolCalls: result.toolCalls?.length ?? 0, ...options?.logContext },
      'LLM call succeeded',
    );

    return result;
  }

  async listModels(): Promise<string[]> {
    const models: string[] = [];
    for await (const model of this.client.models.list()) {
      models.push(model.id);
    }
    return models;
  }
}
