import { NodeSDK } from '@opentelemetry/sdk-node';
import { trace } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { JaegerExporter } from '@opentelemetry/exporter-jaeger';

export function tracingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TRACING_ENABLED === 'true' || env.TRACING_ENABLED === '1';
}

export async function setupTracing(serviceName: string): Promise<() => Promise<void>> {
  if (!tracingEnabled()) return async () => {};
  const jaegerEndpoint = process.env.JAEGER_ENDPOINT || 'http://127.0.0.1:14268/api/traces';
  if (!process.env.OTEL_SERVICE_NAME) {
    process.env.OTEL_SERVICE_NAME = serviceName;
  }

  const exporter = new JaegerExporter({ endpoint: jaegerEndpoint });
  const sdk = new NodeSDK({
    traceExporter: exporter,
    instrumentations: [getNodeAutoInstrumentations({ '@opentelemetry/instrumentation-fs': { enabled: false } })],
  });

  sdk.start();
  const span = trace.getTracer('startup').startSpan(`startup:${serviceName}`);
  span.addEvent('run_start');
  span.end();
  return async () => {
    await sdk.shutdown().catch((e: unknown) => console.warn(`[tracing] shutdown failed: ${e instanceof Error ? e.message : String(e)}`));
  };
}
