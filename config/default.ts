import type { KafkaConfig, LogLevel, TrawlConfig } from "../src/types/index.js";
import type { BrowserType } from "../src/dsl/types.js";

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];
const BROWSERS: readonly BrowserType[] = ["chromium", "firefox", "webkit"];
const COMPRESSIONS = ["gzip", "snappy", "lz4", "none"] as const;

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function kafkaFromEnv(env: Env): KafkaConfig | undefined {
  if (!env.TRAWL_KAFKA_BROKERS) return undefined;
  return {
    brokers: env.TRAWL_KAFKA_BROKERS.split(",").map((b) => b.trim()).filter(Boolean),
    clientId: env.TRAWL_KAFKA_CLIENT_ID ?? "trawl",
    topicPrefix: env.TRAWL_KAFKA_TOPIC_PREFIX ?? "trawl",
    producer: {
      batchSize: int(env.TRAWL_KAFKA_BATCH_SIZE, 50),
      lingerMs: int(env.TRAWL_KAFKA_LINGER_MS, 500),
      compression: pick(env.TRAWL_KAFKA_COMPRESSION, COMPRESSIONS, "gzip"),
    },
  };
}

/**
 * Build the runtime configuration from environment variables.
 * Every value has a default; Kafka stays off unless brokers are given.
 */
export function loadConfig(env: Env = process.env): TrawlConfig {
  return {
    kafka: kafkaFromEnv(env),

    observability: {
      serviceName: env.TRAWL_SERVICE_NAME ?? "trawl",
      traceEndpoint: env.TRAWL_OTLP_TRACES_ENDPOINT,
      metricsEndpoint: env.TRAWL_OTLP_METRICS_ENDPOINT,
      metricsInterval: int(env.TRAWL_METRICS_INTERVAL_MS, 15000),
    },

    crawl: {
      race: int(env.TRAWL_RACE, 1),
      browser: pick(env.TRAWL_BROWSER, BROWSERS, "chromium"),
      timeout: int(env.TRAWL_TIMEOUT_MS, 30_000),
      repeatTimeout: int(env.TRAWL_REPEAT_TIMEOUT_MS, 300_000),
      readyOn: "load",
      outputPath: env.TRAWL_OUTPUT_DIR ?? "./",
      outputName: "trawl_output",
    },

    logLevel: pick(env.TRAWL_LOG_LEVEL, LOG_LEVELS, "info"),
  };
}

export const defaultConfig: TrawlConfig = loadConfig();
