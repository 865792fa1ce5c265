// ============================================================================
// Runtime configuration
// ============================================================================

import type { CrawlDefaults } from "../dsl/schema.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  /** Topic prefix for all crawl topics */
  topicPrefix: string;
  producer?: {
    /** Batch size before flush */
    batchSize?: number;
    /** Max wait before flush (ms) */
    lingerMs?: number;
    compression?: "gzip" | "snappy" | "lz4" | "none";
  };
  ssl?: boolean;
  sasl?:
    | { mechanism: "plain"; username: string; password: string }
    | { mechanism: "scram-sha-256"; username: string; password: string }
    | { mechanism: "scram-sha-512"; username: string; password: string };
}

export interface ObservabilityConfig {
  serviceName: string;
  /** OTLP endpoint for traces; spans are not exported without it */
  traceEndpoint?: string;
  /** OTLP endpoint for metrics; metrics are not exported without it */
  metricsEndpoint?: string;
  /** Metrics export interval (ms) */
  metricsInterval?: number;
  resourceAttributes?: Record<string, string>;
}

export interface TrawlConfig {
  /** Crawl events and results are published when set */
  kafka?: KafkaConfig;
  observability: ObservabilityConfig;
  /** Fallbacks for fields a crawl definition leaves out */
  crawl: CrawlDefaults;
  logLevel: LogLevel;
}

// ============================================================================
// Kafka Event Types
// ============================================================================

export interface TrawlEvent {
  id: string;
  type: TrawlEventType;
  /** Emitting component */
  source: string;
  crawlId: string;
  taskId?: string;
  timestamp: number;
  payload: Record<string, unknown>;
}

export type TrawlEventType =
  | "crawl.started"
  | "crawl.finished"
  | "crawl.error"
  | "crawl.completed"
  | "task.started"
  | "task.succeeded"
  | "task.failed";
