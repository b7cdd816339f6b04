export function buildSwaggerSpec(baseUrl: string) {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Tableau Chat Assistant',
      version: '0.1.0',
      description:
        'Chat with a local Ollama model that uploads, checks, lists and converts Tableau Server datasets through tool calls. ' +
        'The same tools are exposed over MCP (Model Context Protocol).',
    },
    servers: [
      {
        url: baseUrl,
        description: 'API Server',
      },
    ],
    paths: {
      '/api/chat': {
        post: {
          summary: 'Send a conversation and get the assistant reply',
          description:
            'Runs the tool-calling loop: the model may call tools up to MAX_TOOL_ITERATIONS rounds before answering. ' +
            'A system prompt is prepended unless the conversation already has a system message.',
          tags: ['Chat'],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: { $ref: '#/components/schemas/ChatRequest' },
                examples: {
                  upload: {
                    summary: 'Upload a spreadsheet',
                    value: {
                      messages: [{ role: 'user', content: 'Upload sales.xlsx to the Finance project' }],
                    },
                  },
                },
              },
            },
          },
          responses: {
            '200': {
              description: 'Assistant reply',
              content: { 'application/json': { schema: { $ref: '#/components/schemas/ChatResponse' } } },
            },
            '400': {
              description: 'Malformed request body',
              content: { 'application/json': { schema: { $ref: '#/components/schemas/ErrorDetail' } } },
            },
            '500': {
              description: 'Model or orchestration failure',
              content: { 'application/json': { schema: { $ref: '#/components/schemas/ErrorDetail' } } },
            },
          },
        },
      },
      '/api/tools': {
        get: {
          summary: 'List tool definitions',
          tags: ['Chat'],
          responses: {
            '200': {
              description: 'Tool catalog',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      tools: { type: 'array', items: { $ref: '#/components/schemas/ToolDefinition' } },
                    },
                  },
                },
              },
            },
          },
        },
      },
      '/api/health': {
        get: {
          summary: 'Health check',
          description: 'Reports whether the Ollama backend is reachable and which models it serves.',
          tags: ['System'],
          responses: {
            '200': {
              description: 'Ollama reachable',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status: { type: 'string', example: 'healthy' },
                      ollama_running: { type: 'boolean', example: true },
                      current_model: { type: 'string', example: 'llama3.1:8b' },
                      available_models: { type: 'array', items: { type: 'string' } },
                      tools_count: { type: 'integer', example: 4 },
                    },
                  },
                },
              },
            },
            '503': {
              description: 'Ollama unreachable',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status: { type: 'string', example: 'unhealthy' },
                      ollama_running: { type: 'boolean', example: false },
                      error: { type: 'string' },
                    },
                  },
                },
              },
            },
          },
        },
      },
      '/mcp': {
        post: {
          summary: 'MCP StreamableHTTP endpoint',
          description:
            'Handles MCP JSON-RPC requests (initialize, tools/list, tools/call). Stateless mode: each request creates a fresh transport.',
          tags: ['MCP'],
          parameters: [
            {
              name: 'Accept',
              in: 'header',
              required: true,
              schema: { type: 'string', default: 'application/json, text/event-stream' },
              description: 'Must include both application/json and text/event-stream.',
            },
          ],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  required: ['jsonrpc', 'method'],
                  properties: {
                    jsonrpc: { type: 'string', enum: ['2.0'] },
                    id: { type: 'number', example: 1 },
                    method: { type: 'string', enum: ['initialize', 'tools/list', 'tools/call'] },
                    params: { type: 'object' },
                  },
                },
                examples: {
                  listTools: {
                    summary: 'List available tools',
                    value: { jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} },
                  },
                  callListDatasets: {
                    summary: 'Call list_datasets',
                    value: {
                      jsonrpc: '2.0',
                      id: 2,
                      method: 'tools/call',
                      params: { name: 'list_datasets', arguments: { tableau_project: 'Finance' } },
                    },
                  },
                },
              },
            },
          },
          responses: {
            '200': { description: 'JSON-RPC response' },
          },
        },
      },
    },
    components: {
      schemas: {
        ChatMessage: {
          type: 'object',
          required: ['role', 'content'],
          properties: {
            role: { type: 'string', enum: ['user', 'assistant', 'system'] },
            content: { type: 'string' },
          },
        },
        ChatRequest: {
          type: 'object',
          required: ['messages'],
          properties: {
            messages: { type: 'array', minItems: 1, items: { $ref: '#/components/schemas/ChatMessage' } },
            model: { type: 'string', description: 'Ollama model; defaults to OLLAMA_MODEL' },
          },
        },
        ChatResponse: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            role: { type: 'string', enum: ['assistant'] },
            iterations: { type: 'integer', description: 'Tool rounds executed' },
          },
        },
        ToolDefinition: {
          type: 'object',
          properties: {
            name: { type: 'string', example: 'upload_dataset' },
            description: { type: 'string' },
            parameters: { type: 'object' },
          },
        },
        ErrorDetail: {
          type: 'object',
          properties: {
            detail: { type: 'string' },
          },
        },
      },
    },
  };
}
