import { Kafka, CompressionTypes, type Message, type Producer } from "kafkajs";
import pino from "pino";
import type { KafkaConfig, TrawlEvent } from "../types/index.js";
import type { TrawlMetrics } from "../observability/metrics.js";
import { resolveTopicName, eventTypeToTopic } from "./topics.js";

/** The part of a kafkajs producer the event producer drives. */
export type ProducerClient = Pick<Producer, "connect" | "disconnect" | "sendBatch">;

type Codec = NonNullable<NonNullable<KafkaConfig["producer"]>["compression"]>;

const COMPRESSION: Record<Codec, CompressionTypes> = {
  none: CompressionTypes.None,
  gzip: CompressionTypes.GZIP,
  snappy: CompressionTypes.Snappy,
  lz4: CompressionTypes.LZ4,
};

/**
 * Publishes crawl events, keyed by crawl id so one crawl stays on one
 * partition. Pending messages are kept per topic and go out as a single
 * batch once `batchSize` events are pending or `lingerMs` after the first
 * one, whichever is sooner. A failed batch stays pending, ahead of newer
 * events.
 */
export class EventProducer {
  private client: ProducerClient;
  private logger: pino.Logger;
  private pending = new Map<string, Message[]>();
  private pendingCount = 0;
  private linger: ReturnType<typeof setTimeout> | null = null;
  private connected = false;

  constructor(
    private readonly config: KafkaConfig,
    logger?: pino.Logger,
    private readonly metrics?: TrawlMetrics,
    client?: ProducerClient,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "trawl.producer" });
    this.client = client ?? createClient(config);
  }

  get bufferedCount(): number {
    return this.pendingCount;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await this.client.connect();
    this.connected = true;
    this.logger.info({ brokers: this.config.brokers }, "Kafka producer connected");
    if (this.pendingCount > 0) this.armLinger();
  }

  /** Sends what is pending, then closes the connection. */
  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.clearLinger();
    await this.flush();
    await this.client.disconnect();
    this.connected = false;
    this.logger.info("Kafka producer disconnected");
  }

  emit(event: TrawlEvent): void {
    const topic = resolveTopicName(this.config.topicPrefix, eventTypeToTopic(event.type));
    const headers: Record<string, string> = { "event-type": event.type, source: event.source };
    if (event.taskId !== undefined) headers["task-id"] = event.taskId;

    this.enqueue(topic, [
      { key: event.crawlId, value: JSON.stringify(event), headers, timestamp: String(event.timestamp) },
    ]);
    this.metrics?.kafkaEventsEmitted({ topic });

    if (this.pendingCount >= (this.config.producer?.batchSize ?? 50)) {
      this.flush().catch((err) => this.logger.error({ err }, "Batch-size flush failed"));
    } else if (this.connected) {
      this.armLinger();
    }
  }

  /** Sends every pending message. A no-op while disconnected. */
  async flush(): Promise<void> {
    this.clearLinger();
    if (this.pendingCount === 0) return;
    if (!this.connected) {
      this.logger.warn({ count: this.pendingCount }, "Producer not connected, events kept");
      return;
    }

    const sending = this.pending;
    const count = this.pendingCount;
    this.pending = new Map();
    this.pendingCount = 0;

    const topicMessages = Array.from(sending, ([topic, messages]) => ({ topic, messages }));
    try {
      await this.client.sendBatch({
        topicMessages,
        compression: COMPRESSION[this.config.producer?.compression ?? "none"],
      });
      this.logger.debug({ count, topics: topicMessages.length }, "Events published");
    } catch (err) {
      this.requeue(sending);
      this.logger.error({ err, count }, "Failed to publish events");
      throw err;
    }
  }

  private enqueue(topic: string, messages: Message[]): void {
    const queued = this.pending.get(topic);
    if (queued) queued.push(...messages);
    else this.pending.set(topic, [...messages]);
    this.pendingCount += messages.length;
  }

  private requeue(failed: Map<string, Message[]>): void {
    const newer = this.pending;
    this.pending = new Map();
    this.pendingCount = 0;
    for (const [topic, messages] of failed) this.enqueue(topic, messages);
    for (const [topic, messages] of newer) this.enqueue(topic, messages);
  }

  private armLinger(): void {
    if (this.linger) return;
    this.linger = setTimeout(() => {
      this.linger = null;
      this.flush().catch((err) => this.logger.error({ err }, "Linger flush failed"));
    }, this.config.producer?.lingerMs ?? 500);
  }

  private clearLinger(): void {
    if (!this.linger) return;
    clearTimeout(this.linger);
    this.linger = null;
  }
}

function createClient(config: KafkaConfig): Producer {
  const kafka = new Kafka({
    clientId: config.clientId,
    brokers: config.brokers,
    ssl: config.ssl ?? false,
    ...(config.sasl ? { sasl: config.sasl } : {}),
  });
  return kafka.producer({ allowAutoTopicCreation: true });
}
