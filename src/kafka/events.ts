import { nanoid } from "nanoid";
import type { ReconcileResult } from "../engine/reconciler/index.js";
import type { CrawlLogger, CrawlStart, CrawlSummary } from "../observability/logger.js";
import type { TrawlEvent, TrawlEventType } from "../types/index.js";
import type { EventProducer } from "./producer.js";

export function createEvent(
  type: TrawlEventType,
  crawlId: string,
  payload: Record<string, unknown>,
  taskId?: string,
): TrawlEvent {
  const event: TrawlEvent = {
    id: nanoid(),
    type,
    source: "trawl",
    crawlId,
    timestamp: Date.now(),
    payload,
  };
  if (taskId !== undefined) event.taskId = taskId;
  return event;
}

const TASK_EVENTS: Partial<Record<ReconcileResult["current"], TrawlEventType>> = {
  Running: "task.started",
  Succeeded: "task.succeeded",
  Failed: "task.failed",
};

/** Publishes crawl and task lifecycle events to Kafka. */
export class KafkaCrawlLogger implements CrawlLogger {
  constructor(
    private readonly producer: EventProducer,
    private readonly crawlId: string,
  ) {}

  crawlStarted(info: CrawlStart): void {
    this.producer.emit(
      createEvent("crawl.started", this.crawlId, {
        seeds: info.seeds,
        race: info.race,
        mode: info.mode,
      }),
    );
  }

  taskTransition(result: ReconcileResult): void {
    const type = TASK_EVENTS[result.current];
    if (!type) return;
    const payload: Record<string, unknown> = { url: result.url, state: result.current };
    if (result.error !== undefined) payload.error = result.error;
    this.producer.emit(createEvent(type, this.crawlId, payload, result.taskId));
  }

  crawlFinished(summary: CrawlSummary): void {
    this.producer.emit(
      createEvent("crawl.finished", this.crawlId, {
        pages: summary.pages,
        succeeded: summary.succeeded,
        failed: summary.failed,
        durationMs: summary.durationMs,
        dataBytes: summary.dataBytes,
        links: summary.links,
        outputs: summary.outputs,
      }),
    );
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.producer.emit(createEvent("crawl.error", this.crawlId, { message, ...context }));
  }
}
