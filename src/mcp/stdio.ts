import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config/index.js';
import { createServices } from '../services.js';
import { createMcpServer } from './server.js';
import { createLogger, setLogLevel } from '../logger.js';
import { initTracing } from '../tracing.js';

const log = createLogger('MCP');

const config = loadConfig();
setLogLevel(config.logLevel);
initTracing(config);
const { executor } = createServices(config);
const server = createMcpServer({ executor });
const transport = new StdioServerTransport();
await server.connect(transport);
log.info('tableau-chat-assistant MCP server started on stdio');
