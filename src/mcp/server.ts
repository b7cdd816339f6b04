import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { toolRegistry } from '../chat/tools.js';
import type { ToolDefinition, ToolParameter, ToolRegistry } from '../chat/tools.js';
import type { ToolRunner } from '../chat/orchestrator.js';
import { serializeToolResult } from '../tools/result.js';

export interface McpServerDeps {
  executor: ToolRunner;
  registry?: ToolRegistry;
}

function toZod(parameter: ToolParameter): z.ZodTypeAny {
  switch (parameter.type) {
    case 'string':
      return z.string().describe(parameter.description);
    case 'number':
      return z.number().describe(parameter.description);
    case 'boolean':
      return z.boolean().describe(parameter.description);
  }
}

/** Zod raw shape for `server.tool`, built from a registry definition. */
export function toZodShape(definition: ToolDefinition): Record<string, z.ZodTypeAny> {
  const required = new Set(definition.parameters.required);
  return Object.fromEntries(
    Object.entries(definition.parameters.properties).map(([name, parameter]) => {
      const schema = toZod(parameter);
      return [name, required.has(name) ? schema : schema.optional()];
    }),
  );
}

/**
 * Create the MCP server exposing every registry tool through the executor.
 * Separated from the transports so tests can connect an in-memory client.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const registry = deps.registry ?? toolRegistry;
  const server = new McpServer(
    {
      name: 'tableau-chat-assistant',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  for (const definition of registry.definitions()) {
    server.tool(definition.name, definition.description, toZodShape(definition), async (args) => {
      const result = await deps.executor.execute(definition.name, args);
      return {
        content: [{ type: 'text' as const, text: serializeToolResult(result) }],
        isError: result.status === 'error',
      };
    });
  }

  return server;
}
