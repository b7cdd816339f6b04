import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/index.js';
import { loadConfig } from '../../src/config/index.js';
import { ToolExecutor } from '../../src/tools/executor.js';
import { FileResolver } from '../../src/files/resolver.js';
import { createFakeConverter, createFakeGateway, ScriptedLLM } from '../helpers.js';

/**
 * Parse SSE response text to extract JSON-RPC message
 * MCP StreamableHTTP sends responses as Server-Sent Events
 */
function parseSSEResponse(text: string): unknown {
  for (const line of text.split('\n')) {
    if (line.startsWith('data: ')) {
      return JSON.parse(line.substring(6));
    }
  }
  return null;
}

describe('App E2E', () => {
  let app: Express;
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'app-'));
    const config = loadConfig({
      TABLEAU_SERVER: 'https://tableau.test.local',
      TABLEAU_PAT_NAME: 'test-token',
      TABLEAU_PAT_SECRET: 'test-secret',
      DEFAULT_FILE_DIRECTORY: dir,
      MAX_TOOL_ITERATIONS: '2',
    });
    const executor = new ToolExecutor({
      gateway: createFakeGateway({ Default: [{ name: 'sales', id: 'ds-1', project_id: 'project-Default' }] }),
      converter: createFakeConverter(),
      resolver: new FileResolver(dir),
      defaultProject: config.defaultProject,
    });
    const llmProvider = new ScriptedLLM((call) =>
      call === 0 ? { toolCalls: [{ id: 'c1', name: 'list_datasets', args: {} }] } : { content: 'One dataset: sales.' },
    );
    app = createApp(config, { llmProvider, executor }).app;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run a chat turn end to end', async () => {
    const res = await request(app)
      .post('/api/chat')
      .send({ messages: [{ role: 'user', content: 'What is in the default project?' }] });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'One dataset: sales.', role: 'assistant', iterations: 1 });
  });

  it('should serve the OpenAPI document', async () => {
    const res = await request(app).get('/openapi.json');

    expect(res.status).toBe(200);
    expect(Object.keys(res.body.paths)).toEqual(['/api/chat', '/api/tools', '/api/health', '/mcp']);
  });

  it('should handle MCP tools/call over HTTP', async () => {
    const res = await request(app)
      .post('/mcp')
      .set('Accept', 'application/json, text/event-stream')
      .send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'check_dataset', arguments: { dataset_name: 'sales' } },
      });

    expect(res.status).toBe(200);
    expect(parseSSEResponse(res.text)).toMatchObject({
      jsonrpc: '2.0',
      id: 2,
      result: {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              status: 'success',
              action: 'check_dataset',
              result: { exists: true, name: 'sales', id: 'ds-1', project_id: 'project-Default' },
            }),
          },
        ],
        isError: false,
      },
    });
  });

  it('should reject GET /mcp in stateless mode', async () => {
    const res = await request(app).get('/mcp');

    expect(res.status).toBe(405);
  });
});
