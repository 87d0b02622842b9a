import { SpanStatusCode, trace, type Span, type Tracer } from "@opentelemetry/api";

const SERVICE_NAME = "hybrid-kb-rag";

let sdkStarted = false;

/**
 * Starts the OpenTelemetry Node SDK with an OTLP/HTTP exporter.
 * No-op unless OTEL_ENABLED=true.
 */
export async function initTracing(): Promise<void> {
  if (process.env.OTEL_ENABLED !== "true") return;
  if (sdkStarted) return;

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { getNodeAutoInstrumentations } = await import(
    "@opentelemetry/auto-instrumentations-node"
  );
  const { OTLPTraceExporter } = await import(
    "@opentelemetry/exporter-trace-otlp-http"
  );

  const endpoint =
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";

  const sdk = new NodeSDK({
    serviceName: SERVICE_NAME,
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    instrumentations: [getNodeAutoInstrumentations()],
  });

  sdk.start();
  sdkStarted = true;
}

/**
 * Tracer for ingestion and retrieval spans.
 * When no SDK is registered all spans are no-ops.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Run `fn` inside an active span named `name`, so spans started within it
 * (including auto-instrumented HTTP calls) nest under it. The span is marked
 * OK or ERROR by outcome.
 */
export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
  return getTracer().startActiveSpan(name, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}

/** Reset internal state (for tests only). */
export function _resetTracing(): void {
  sdkStarted = false;
}
