import {
  context,
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
  propagation,
  type Tracer,
} from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { TracesExporter } from '../config/env.validation';
import { createLogger } from '../utils/logger';
import { describeServiceResource, type ServiceResource } from './service-resource';

export interface ObservabilityConfig {
  exporter: TracesExporter;
  otlpEndpoint?: string;
  serviceVersion?: string;
  environment?: string;
}

/**
 * Owned by the process entry point: one per service, shut down explicitly
 * before the process exits so buffered spans are flushed.
 */
export interface ObservabilityHandle {
  readonly serviceName: string;
  readonly resource: ServiceResource;
  readonly tracer: Tracer;
  shutdown(): Promise<void>;
}

const logger = createLogger('Observability');

// Context manager and propagator are process-wide; tracer providers are per service.
let globalsInstalled = false;

function installGlobals(): void {
  if (globalsInstalled) {
    return;
  }

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);
  context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());
  propagation.setGlobalPropagator(
    new CompositePropagator({
      propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
    }),
  );
  globalsInstalled = true;
}

function resolveTracesUrl(endpoint: string): string {
  return endpoint.endsWith('/v1/traces') ? endpoint : `${endpoint.replace(/\/$/, '')}/v1/traces`;
}

function buildExporter(config: ObservabilityConfig): SpanExporter | undefined {
  if (config.exporter === 'console') {
    return new ConsoleSpanExporter();
  }

  if (config.exporter === 'otlp' && config.otlpEndpoint) {
    return new OTLPTraceExporter({ url: resolveTracesUrl(config.otlpEndpoint) });
  }

  return undefined;
}

export function initObservability(
  serviceName: string,
  config: ObservabilityConfig,
): ObservabilityHandle {
  installGlobals();

  const resource = describeServiceResource(serviceName, config);
  const provider = new NodeTracerProvider({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: resource.serviceName,
      [ATTR_SERVICE_VERSION]: resource.serviceVersion,
      'deployment.environment': resource.environment,
      'host.name': resource.hostName,
      'os.type': resource.osType,
    }),
  });

  const exporter = buildExporter(config);
  if (exporter) {
    provider.addSpanProcessor(new BatchSpanProcessor(exporter));
  }

  logger.info('observability_initialized', {
    event: 'observability_initialized',
    service: serviceName,
    exporter: exporter ? config.exporter : 'none',
  });

  let shutdownPromise: Promise<void> | undefined;

  return {
    serviceName,
    resource,
    tracer: provider.getTracer(serviceName, config.serviceVersion),
    shutdown: () => {
      if (!shutdownPromise) {
        shutdownPromise = provider.shutdown().catch((error: unknown) => {
          logger.warn('observability_shutdown_failed', {
            event: 'observability_shutdown_failed',
            service: serviceName,
            errorMessage: error instanceof Error ? error.message : String(error),
          });
        });
      }
      return shutdownPromise;
    },
  };
}
