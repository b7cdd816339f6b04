import pino from 'pino';
import { parseLogLevel } from './config/index.js';
import type { LogLevel } from './config/index.js';

const nodeEnv = process.env.NODE_ENV || 'development';
const isDevMode = nodeEnv === 'development';
// stdout carries the protocol when running as an MCP stdio server
const useStderr = /[\\/]mcp[\\/]stdio\.[jt]s$/.test(process.argv[1] ?? '');

const logger = pino({
  // Bootstrap level until setLogLevel applies the loaded config
  level: parseLogLevel(process.env.LOG_LEVEL, nodeEnv),
  base: {
    service: 'tableau-chat-assistant',
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Level as string ("info") instead of number (30)
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  ...(isDevMode
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,component,service,env',
            singleLine: true,
            messageFormat: '[{component}] {msg}',
            destination: useStderr ? 2 : 1,
          },
        },
      }
    : {}),
  redact: {
    paths: [
      'patSecret',
      'tableau.patSecret',
      'token',
      'session.token',
      'apiKey',
      'password',
    ],
    censor: '[REDACTED]',
  },
}, isDevMode ? undefined : pino.destination(useStderr ? 2 : 1));

export { logger };

// pino children copy the parent's level at creation
const levelled: Array<{ level: string }> = [logger];

export function createLogger(component: string) {
  const child = logger.child({ component });
  levelled.push(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  for (const target of levelled) {
    target.level = level;
  }
}

export type Logger = ReturnType<typeof createLogger>;
