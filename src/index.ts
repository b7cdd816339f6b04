import 'dotenv/config';
import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Config } from './config/index.js';
import { loadConfig } from './config/index.js';
import { createChatRoutes } from './chat/chatHandler.js';
import { createMcpServer } from './mcp/server.js';
import { createServices } from './services.js';
import type { Services } from './services.js';
import { buildSwaggerSpec } from './swagger.js';
import { errorMessage } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { initTracing } from './tracing.js';

const log = createLogger('Server');

function createApp(config: Config, services: Services = createServices(config)) {
  const app = express();
  const swaggerSpec = buildSwaggerSpec(`http://localhost:${config.port}`);

  app.use(express.json());

  // Swagger UI
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get('/openapi.json', (_req, res) => res.json(swaggerSpec));

  app.use(
    '/api',
    createChatRoutes({
      llmProvider: services.llmProvider,
      executor: services.executor,
      maxToolIterations: config.maxToolIterations,
    }),
  );

  // MCP StreamableHTTP endpoint (stateless mode)
  app.post('/mcp', async (req, res) => {
    try {
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
      const server = createMcpServer({ executor: services.executor });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error({ action: 'mcp.failed', error: errorMessage(error) }, 'MCP request failed');
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal MCP error' });
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).json({ error: 'SSE not supported in stateless mode. Use POST /mcp instead.' });
  });

  app.delete('/mcp', (_req, res) => {
    res.status(405).json({ error: 'Session management not supported in stateless mode.' });
  });

  return { app };
}

function startServer() {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    initTracing(config);
    const { app } = createApp(config);

    app.listen(config.port, config.host, () => {
      log.info({ host: config.host, port: config.port }, 'tableau-chat-assistant server listening');
      log.info({ url: `http://localhost:${config.port}/mcp` }, 'MCP endpoint ready');
      log.info({ model: config.ollamaModel, directory: config.defaultFileDirectory }, `Environment: ${config.nodeEnv}`);
    });
  } catch (error) {
    log.fatal({ error: errorMessage(error) }, 'Failed to start server');
    process.exit(1);
  }
}

// Export for testing
export { createApp, startServer };
export type { Config };

// Only start server when run directly (not imported by tests)
const isMainModule = process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts');
if (isMainModule) {
  startServer();
}
