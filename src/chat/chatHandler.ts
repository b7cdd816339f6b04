import { Router } from 'express';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { LLMMessage, LLMProvider } from './llmProvider.js';
import { runToolLoop } from './orchestrator.js';
import type { ToolRunner } from './orchestrator.js';
import { SYSTEM_PROMPT } from './systemPrompt.js';
import { toolRegistry } from './tools.js';
import type { ToolRegistry } from './tools.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('Chat');

const chatRequestSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant', 'system']),
        content: z.string(),
      }),
    )
    .min(1, 'messages must contain at least one message'),
  model: z.string().min(1).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ChatResponse {
  message: string;
  role: 'assistant';
  iterations: number;
}

export interface ChatHandlerDeps {
  llmProvider: LLMProvider;
  executor: ToolRunner;
  registry?: ToolRegistry;
  maxToolIterations?: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function createChatRoutes(deps: ChatHandlerDeps): Router {
  const router = Router();
  const registry = deps.registry ?? toolRegistry;

  router.post('/chat', async (req, res) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ detail: formatIssues(parsed.error) });
      return;
    }

    const { messages, model } = parsed.data;
    const requestId = randomUUID();
    const conversation: LLMMessage[] = messages.some((m) => m.role === 'system')
      ? [...messages]
      : [{ role: 'system', content: SYSTEM_PROMPT }, ...messages];

    try {
      const result = await runToolLoop(
        conversation,
        { llm: deps.llmProvider, executor: deps.executor, registry },
        {
          model: model ?? deps.llmProvider.model,
          maxIterations: deps.maxToolIterations,
          logContext: { requestId },
        },
      );

      log.info(
        { action: 'chat.completed', requestId, iterations: result.iterations, truncated: result.truncated },
        'Chat request completed',
      );

      const response: ChatResponse = { message: result.message, role: 'assistant', iterations: result.iterations };
      res.json(response);
    } catch (error) {
      log.error({ action: 'chat.failed', requestId, error: errorMessage(error) }, 'Chat processing failed');
      res.status(500).json({ detail: `Chat processing failed: ${errorMessage(error)}` });
    }
  });

  router.get('/tools', (_req, res) => {
    try {
      res.json({ tools: registry.definitions() });
    } catch (error) {
      res.status(500).json({ detail: errorMessage(error) });
    }
  });

  router.get('/health', async (_req, res) => {
    try {
      const models = await deps.llmProvider.listModels();
      res.json({
        status: 'healthy',
        ollama_running: true,
        current_model: deps.llmProvider.model,
        available_models: models,
        tools_count: registry.definitions().length,
      });
    } catch (error) {
      log.warn({ action: 'health.failed', error: errorMessage(error) }, 'LLM backend unreachable');
      res.status(503).json({ status: 'unhealthy', ollama_running: false, error: errorMessage(error) });
    }
  });

  return router;
}
