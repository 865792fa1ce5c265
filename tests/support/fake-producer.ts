import type { ProducerBatch } from "kafkajs";
import type { ProducerClient } from "../../src/kafka/producer.js";

/** In-process stand-in for a kafkajs producer that records every batch. */
export function fakeProducerClient(options: { failures?: number } = {}) {
  const batches: ProducerBatch[] = [];
  let failures = options.failures ?? 0;

  const client: ProducerClient = {
    connect: async () => {},
    disconnect: async () => {},
    sendBatch: async (batch) => {
      if (failures > 0) {
        failures--;
        throw new Error("broker down");
      }
      batches.push(batch);
      return [];
    },
  };
  return { client, batches };
}

/** Event types per topic in one batch, in send order. */
export function eventTypes(batch: ProducerBatch | undefined): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const { topic, messages } of batch?.topicMessages ?? []) {
    out[topic] = messages.map((m) => {
      const parsed: unknown = JSON.parse(String(m.value));
      return typeof parsed === "object" && parsed !== null && "type" in parsed ? String(parsed.type) : "";
    });
  }
  return out;
}
