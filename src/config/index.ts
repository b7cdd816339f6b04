import os from 'node:os';
import path from 'node:path';

type Env = Record<string, string | undefined>;

function getRequiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`${key} environment variable is required`);
  }
  return value;
}

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    throw new Error(`PORT must be between 1 and 65535 (got: ${value})`);
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer (got: ${value})`);
  }
  return parsed;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Defaults to `debug` in development and `info` elsewhere. */
export function parseLogLevel(value: string | undefined, nodeEnv: string): LogLevel {
  if (!value) return nodeEnv === 'development' ? 'debug' : 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got: ${value})`);
  }
  return level;
}

export function loadConfig(env: Env = process.env) {
  const nodeEnv = env.NODE_ENV || 'development';
  return {
    host: env.HOST || '0.0.0.0',
    port: parsePort(env.PORT, 8000),
    nodeEnv,
    logLevel: parseLogLevel(env.LOG_LEVEL, nodeEnv),

    // Ollama (OpenAI-compatible API)
    ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434/v1',
    ollamaModel: env.OLLAMA_MODEL || 'llama3.1:8b',
    maxToolIterations: parsePositiveInt(env.MAX_TOOL_ITERATIONS, 5, 'MAX_TOOL_ITERATIONS'),

    tableau: {
      serverUrl: getRequiredEnv(env, 'TABLEAU_SERVER').replace(/\/+$/, ''),
      siteId: env.TABLEAU_SITE_ID || '',
      patName: getRequiredEnv(env, 'TABLEAU_PAT_NAME'),
      patSecret: getRequiredEnv(env, 'TABLEAU_PAT_SECRET'),
      apiVersion: env.TABLEAU_API_VERSION || '3.19',
    },
    defaultProject: env.TABLEAU_PROJECT_NAME || 'Default',

    defaultFileDirectory: path.resolve(env.DEFAULT_FILE_DIRECTORY || path.join(os.homedir(), 'Downloads')),
    hyperEndpoint: env.HYPER_ENDPOINT || 'postgresql://tableau_internal_user@localhost:7483',

    // Tracing (optional)
    otlpCollectorEndpoint: env.OTLP_COLLECTOR_ENDPOINT || '',
  };
}

export type Config = ReturnType<typeof loadConfig>;
export type TableauConfig = Config['tableau'];
