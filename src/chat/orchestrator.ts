import type { LLMMessage, LLMProvider } from './llmProvider.js';
import { toolRegistry } from './tools.js';
import type { ToolRegistry } from './tools.js';
import type { ToolResult } from '../tools/result.js';
import { serializeToolResult } from '../tools/result.js';
import { createLogger } from '../logger.js';

const log = createLogger('Orchestrator');

export const MAX_TOOL_ITERATIONS = 5;
export const TRUNCATION_MESSAGE =
  'I apologize, but I reached the maximum number of tool calls for this request. Please try again with a simpler request.';
export const EMPTY_RESPONSE_MESSAGE = 'I apologize, but I was unable to generate a response.';

export interface ToolRunner {
  execute(name: string, args: Record<string, unknown>): Promise<ToolResult>;
}

export interface OrchestratorDeps {
  llm: LLMProvider;
  executor: ToolRunner;
  registry?: ToolRegistry;
}

export interface ToolLoopOptions {
  model?: string;
  maxIterations?: number;
  logContext?: Record<string, unknown>;
}

export interface ToolLoopResult {
  message: string;
  /** Tool rounds executed. */
  iterations: number;
  truncated: boolean;
  /** Full conversation including assistant tool calls and tool messages. */
  messages: LLMMessage[];
}

/**
 * Calls the model, runs whatever tools it asks for, and repeats until it
 * answers in text or `maxIterations` tool rounds have run. With a model that
 * always asks for tools this makes exactly `maxIterations` LLM calls.
 */
export async function runToolLoop(
  messages: readonly LLMMessage[],
  deps: OrchestratorDeps,
  options: ToolLoopOptions = {},
): Promise<ToolLoopResult> {
  const maxIterations = options.maxIterations ?? MAX_TOOL_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new Error(`maxIterations must be a positive integer (got: ${maxIterations})`);
  }

  const registry = deps.registry ?? toolRegistry;
  const tools = registry.toLLMTools();
  const chatOptions = { model: options.model, logContext: options.logContext };
  const history: LLMMessage[] = [...messages];
  let iterations = 0;

  let response = await deps.llm.chat(history, tools, chatOptions);

  while (response.toolCalls && response.toolCalls.length > 0) {
    iterations++;
    history.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });

    for (const call of response.toolCalls) {
      const result = await deps.executor.execute(call.name, call.args);
      history.push({
        role: 'tool',
        name: call.name,
        toolCallId: call.id,
        content: serializeToolResult(result),
      });
    }

    log.debug({ action: 'chat.round.completed', round: iterations, calls: response.toolCalls.length, ...options.logContext }, 'Tool round completed');

    if (iterations >= maxIterations) {
      log.warn({ action: 'chat.truncated', iterations, ...options.logContext }, 'Tool iteration limit reached');
      history.push({ role: 'assistant', content: TRUNCATION_MESSAGE });
      return { message: TRUNCATION_MESSAGE, iterations, truncated: true, messages: history };
    }

    response = await deps.llm.chat(history, tools, chatOptions);
  }

  const message = response.content || EMPTY_RESPONSE_MESSAGE;
  history.push({ role: 'assistant', content: message });
  return { message, iterations, truncated: false, messages: history };
}
