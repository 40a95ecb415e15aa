import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { context, metrics, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Meter, Tracer } from '@opentelemetry/api';

let sdk: NodeSDK | undefined;

/**
 * Initialise the OpenTelemetry SDK with OTLP gRPC exporters.
 *
 * A no-op unless `otlpEndpoint` or `OTEL_EXPORTER_OTLP_ENDPOINT` is set; the
 * OTel API then hands out no-op tracers and meters.
 */
export function initTelemetry(opts: {
  serviceName: string;
  otlpEndpoint?: string;
}): boolean {
  if (sdk) {
    throw new Error('initTelemetry() has already been called. Call shutdownTelemetry() first.');
  }

  const endpoint =
    opts.otlpEndpoint ?? process.env['OTEL_EXPORTER_OTLP_ENDPOINT'];
  if (!endpoint) return false;

  sdk = new NodeSDK({
    serviceName: opts.serviceName,
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: endpoint }),
    }),
  });
  sdk.start();
  return true;
}

/**
 * Flush pending spans and metrics and stop the SDK. Resolves immediately if
 * the SDK was never initialised.
 */
export async function shutdownTelemetry(): Promise<void> {
  const instance = sdk;
  sdk = undefined;
  await instance?.shutdown();
}

/** Obtain a Tracer scoped to the given name (usually the package name). */
export function getTracer(name: string): Tracer {
  return trace.getTracer(name);
}

/** Obtain a Meter scoped to the given name (usually the package name). */
export function getMeter(name: string): Meter {
  return metrics.getMeter(name);
}

/**
 * Run `fn` inside an active span. The span is marked OK when `fn` resolves and
 * ERROR (with the message) when it rejects; the rejection is re-thrown.
 */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = await context.with(trace.setSpan(context.active(), span), fn);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (err) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
    throw err;
  } finally {
    span.end();
  }
}
