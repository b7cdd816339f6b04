/**
 * OpenTelemetry tracing for tool calls, exported over OTLP/protobuf.
 * No-op when no collector endpoint is configured.
 */
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import type { Config } from './config/index.js';
import { createLogger } from './logger.js';

const log = createLogger('Tracing');

export const TRACING_SERVICE_NAME = 'tableau-chat-assistant';

/**
 * Registers the global tracer provider. Tracers obtained earlier through
 * `trace.getTracer` start exporting once this has run.
 */
export function initTracing(config: Pick<Config, 'otlpCollectorEndpoint'>): NodeTracerProvider | undefined {
  const endpoint = config.otlpCollectorEndpoint.replace(/\/+$/, '');
  if (!endpoint) {
    log.info('OTLP_COLLECTOR_ENDPOINT not set, tracing disabled');
    return undefined;
  }

  const url = `${endpoint}/v1/traces`;
  const provider = new NodeTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: TRACING_SERVICE_NAME,
    }),
    spanProcessors: [new SimpleSpanProcessor(new OTLPTraceExporter({ url }))],
  });

  provider.register();
  log.info({ endpoint: url }, 'OTLP protobuf exporter initialized');
  return provider;
}
