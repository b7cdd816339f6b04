import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { OllamaProvider, parseToolArguments } from '../src/chat/ollamaClient.js';
import type { ChatCompletionClient } from '../src/chat/ollamaClient.js';
import { toolRegistry } from '../src/chat/tools.js';

function completion(message: OpenAI.Chat.ChatCompletionMessage): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'llama3.1:8b',
    choices: [{ index: 0, finish_reason: 'stop', logprobs: null, message }],
  };
}

function fakeClient(response: OpenAI.Chat.ChatCompletion | Error) {
  const create = vi.fn(async (_params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming) => {
    if (response instanceof Error) throw response;
    return response;
  });
  const client: ChatCompletionClient = {
    chat: { completions: { create } },
    models: {
      async *list() {
        yield { id: 'llama3.1:8b' };
        yield { id: 'qwen2.5:7b' };
      },
    },
  };
  return { client, create };
}

const config = { baseUrl: 'http://ollama.test/v1', model: 'llama3.1:8b' };

describe('OllamaProvider', () => {
  it('should return text content', async () => {
    const { client } = fakeClient(completion({ role: 'assistant', content: 'Hello', refusal: null }));
    const provider = new OllamaProvider(config, client);

    const res = await provider.chat([{ role: 'user', content: 'hi' }], []);

    expect(res).toEqual({ content: 'Hello' });
  });

  it('should map messages and tools to the OpenAI format', async () => {
    const { client, create } = fakeClient(completion({ role: 'assistant', content: 'ok', refusal: null }));
    const provider = new OllamaProvider(config, client);

    await provider.chat(
      [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'list' },
        { role: 'assistant', toolCalls: [{ id: 'c1', name: 'list_datasets', args: {} }] },
        { role: 'tool', name: 'list_datasets', toolCallId: 'c1', content: '{"status":"success"}' },
      ],
      toolRegistry.toLLMTools(),
      { model: 'qwen2.5:7b' },
    );

    const params = create.mock.calls[0]?.[0];
    expect(params?.model).toBe('qwen2.5:7b');
    expect(params?.messages).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'list' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'list_datasets', arguments: '{}' } }],
      },
      { role: 'tool', content: '{"status":"success"}', tool_call_id: 'c1' },
    ]);
    expect(params?.tools?.map((t) => t.function.name)).toEqual([
      'upload_dataset',
      'check_dataset',
      'list_datasets',
      'convert_excel_to_hyper',
    ]);
  });

  it('should omit tools when none are offered', async () => {
    const { client, create } = fakeClient(completion({ role: 'assistant', content: 'ok', refusal: null }));

    await new OllamaProvider(config, client).chat([{ role: 'user', content: 'hi' }], []);

    expect(create.mock.calls[0]?.[0].tools).toBeUndefined();
    expect(create.mock.calls[0]?.[0].model).toBe('llama3.1:8b');
  });

  it('should parse tool calls', async () => {
    const { client } = fakeClient(
      completion({
        role: 'assistant',
        content: null,
        refusal: null,
        tool_calls: [
          {
            id: 'call_1',
            type: 'function',
            function: { name: 'check_dataset', arguments: '{"dataset_name":"sales"}' },
          },
        ],
      }),
    );

    const res = await new OllamaProvider(config, client).chat([{ role: 'user', content: 'is sales there?' }], []);

    expect(res).toEqual({ toolCalls: [{ id: 'call_1', name: 'check_dataset', args: { dataset_name: 'sales' } }] });
  });

  it('should wrap API errors', async () => {
    const { client } = fakeClient(new OpenAI.APIError(404, { message: 'model not found' }, undefined, undefined));

    await expect(new OllamaProvider(config, client).chat([{ role: 'user', content: 'hi' }], [])).rejects.toThrow(
      /^Ollama API error \(404\): .*model not found/,
    );
  });

  it('should fail when no choices are returned', async () => {
    const { client } = fakeClient({ ...completion({ role: 'assistant', content: 'x', refusal: null }), choices: [] });

    await expect(new OllamaProvider(config, client).chat([{ role: 'user', content: 'hi' }], [])).rejects.toThrow(
      'No choices returned from Ollama',
    );
  });

  it('should list model ids', async () => {
    const { client } = fakeClient(completion({ role: 'assistant', content: 'x', refusal: null }));

    await expect(new OllamaProvider(config, client).listModels()).resolves.toEqual(['llama3.1:8b', 'qwen2.5:7b']);
  });
});

describe('parseToolArguments', () => {
  it('should parse a JSON object', () => {
    expect(parseToolArguments('{"tableau_project":"Finance"}')).toEqual({ tableau_project: 'Finance' });
  });

  it.each(['not json', '[1,2]', '"text"', 'null'])('should treat %s as an empty mapping', (raw) => {
    expect(parseToolArguments(raw)).toEqual({});
  });

  it('should treat an empty string as an empty mapping', () => {
    expect(parseToolArguments('')).toEqual({});
  });
});
