import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let provider: NodeTracerProvider | null = null;

/**
 * Initialize the OpenTelemetry trace provider. Call once at startup.
 * Until then every span below is a no-op.
 */
export function initTracing(config: ObservabilityConfig): void {
  if (provider) return;

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.resourceAttributes ?? {}),
  });

  provider = new NodeTracerProvider({ resource });

  if (config.traceEndpoint) {
    const exporter = new OTLPTraceExporter({ url: config.traceEndpoint });
    provider.addSpanProcessor(new BatchSpanProcessor(exporter));
  }

  provider.register();
}

export async function shutdownTracing(): Promise<void> {
  if (provider) {
    await provider.shutdown();
    provider = null;
  }
}

export function getTracer(component: string): Tracer {
  return trace.getTracer(`trawl.${component}`);
}

/** Root span for one crawl task (one page visit). */
export function startTaskSpan(url: string, taskId: string): { span: Span; ctx: Context } {
  const span = getTracer("task").startSpan(`task ${url}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      "trawl.task.id": taskId,
      "trawl.task.url": url,
    },
  });
  return { span, ctx: trace.setSpan(context.active(), span) };
}

/** Child span for one node pass over one matched element. */
export function startNodeSpan(
  parentCtx: Context,
  node: string,
  index: number,
): { span: Span; ctx: Context } {
  const span = getTracer("node").startSpan(
    `node ${node}`,
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        "trawl.node.name": node,
        "trawl.node.index": index,
      },
    },
    parentCtx,
  );
  return { span, ctx: trace.setSpan(parentCtx, span) };
}

export function endSpanOk(span: Span): void {
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

export function endSpanError(span: Span, error: Error | string): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: typeof error === "string" ? error : error.message,
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.end();
}
