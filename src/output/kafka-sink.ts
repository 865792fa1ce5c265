import { createEvent } from "../kafka/events.js";
import type { EventProducer } from "../kafka/producer.js";
import { resolveTopicName, TOPICS } from "../kafka/topics.js";
import type { CrawlResult, OutputSink } from "./sink.js";

/** Publishes the finished result as a `crawl.completed` event. */
export class KafkaSink implements OutputSink {
  readonly name = "KAFKA";

  constructor(
    private readonly producer: EventProducer,
    private readonly topicPrefix: string,
  ) {}

  async write(result: CrawlResult): Promise<string> {
    this.producer.emit(
      createEvent("crawl.completed", result.crawlId, {
        data: result.data,
        links: result.links,
        report: result.report,
      }),
    );
    await this.producer.flush();
    return resolveTopicName(this.topicPrefix, TOPICS.RESULTS);
  }
}
