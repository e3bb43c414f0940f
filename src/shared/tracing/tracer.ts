import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';

type InstrumentationConfig = NonNullable<
  Parameters<typeof getNodeAutoInstrumentations>[0]
>;

/**
 * Span name for an outbound provider call made through fetch
 */
export function providerSpanName(request: {
  method: string;
  origin: string;
}): string {
  return `flashcards.provider ${request.method} ${new URL(request.origin).host}`;
}

// TCP transport in, provider SDK fetch calls out; no HTTP server
export const instrumentationConfig: InstrumentationConfig = {
  '@opentelemetry/instrumentation-net': {
    enabled: true,
  },
  '@opentelemetry/instrumentation-undici': {
    enabled: true,
    requestHook: (span, request) => {
      span.updateName(providerSpanName(request));
    },
  },
  '@opentelemetry/instrumentation-nestjs-core': {
    enabled: true,
  },
  '@opentelemetry/instrumentation-http': {
    enabled: false,
  },
  '@opentelemetry/instrumentation-express': {
    enabled: false,
  },
  '@opentelemetry/instrumentation-fs': {
    enabled: false,
  },
  '@opentelemetry/instrumentation-dns': {
    enabled: false,
  },
};

export function initTracer(serviceName: string): NodeSDK {
  const traceExporter = new OTLPTraceExporter({
    url:
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT ||
      'http://localhost:4318/v1/traces',
    headers: {},
  });

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: process.env.APP_VERSION || '1.0.0',
    'deployment.environment': process.env.NODE_ENV || 'development',
  });

  const sdk = new NodeSDK({
    resource,
    spanProcessors: [new BatchSpanProcessor(traceExporter)],
    instrumentations: [getNodeAutoInstrumentations(instrumentationConfig)],
  });

  sdk.start();
  console.log(`OpenTelemetry tracer initialized for: ${serviceName}`);

  return sdk;
}

export async function shutdownTracer(sdk: NodeSDK): Promise<void> {
  try {
    await sdk.shutdown();
    console.log('OpenTelemetry tracer shut down');
  } catch (error) {
    console.error('Error shutting down tracer:', error);
  }
}
