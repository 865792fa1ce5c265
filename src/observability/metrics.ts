import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
} from "@opentelemetry/sdk-metrics";
import { metrics, type Meter } from "@opentelemetry/api";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let meterProvider: MeterProvider | null = null;

/**
 * Initialize the OpenTelemetry meter provider and build the crawl
 * instruments on it.
 */
export function initMetrics(config: ObservabilityConfig): TrawlMetrics {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.resourceAttributes ?? {}),
  });

  const readers: MetricReader[] = [];

  if (config.metricsEndpoint) {
    readers.push(
      new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: config.metricsEndpoint }),
        exportIntervalMillis: config.metricsInterval ?? 15000,
      }),
    );
  }

  meterProvider = new MeterProvider({ resource, readers });
  return createMetrics(meterProvider.getMeter("trawl"));
}

export async function shutdownMetrics(): Promise<void> {
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
}

/** Instruments on the global (no-op unless registered) meter. */
export function noopMetrics(): TrawlMetrics {
  return createMetrics(metrics.getMeter("trawl"));
}

export interface TrawlMetrics {
  /** Settled tasks, by final status */
  taskCount: (attrs: { status: string }) => void;
  /** Duration of one node pass over one element */
  nodeDuration: (ms: number, attrs: { node: string }) => void;
  /** New (deduplicated) links recorded, by group */
  linksCaptured: (attrs: { group: string }) => void;
  /** Page contexts currently open; pass +1 / -1 */
  openContexts: (delta: number) => void;
  /** Events handed to the Kafka producer */
  kafkaEventsEmitted: (attrs: { topic: string }) => void;
}

function createMetrics(meter: Meter): TrawlMetrics {
  const taskCounter = meter.createCounter("trawl.tasks.total", {
    description: "Total crawl tasks settled",
  });

  const nodeHist = meter.createHistogram("trawl.nodes.duration_ms", {
    description: "Node pass duration in milliseconds",
    unit: "ms",
  });

  const linkCounter = meter.createCounter("trawl.links.captured_total", {
    description: "Total links captured",
  });

  const contextGauge = meter.createUpDownCounter("trawl.contexts.open", {
    description: "Currently open page contexts",
  });

  const kafkaCounter = meter.createCounter("trawl.kafka.events_total", {
    description: "Total events emitted to Kafka",
  });

  return {
    taskCount: (attrs) => taskCounter.add(1, attrs),
    nodeDuration: (ms, attrs) => nodeHist.record(ms, attrs),
    linksCaptured: (attrs) => linkCounter.add(1, attrs),
    openContexts: (delta) => contextGauge.add(delta),
    kafkaEventsEmitted: (attrs) => kafkaCounter.add(1, attrs),
  };
}
