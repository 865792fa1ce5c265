/**
 * Kafka topic definitions. All topics are prefixed with the configured
 * topicPrefix.
 */

export const TOPICS = {
  /** Crawl lifecycle events */
  CRAWLS: "crawls",
  /** Task lifecycle events, keyed by crawl id */
  TASKS: "tasks",
  /** Finished crawl results (result tree, links, report) */
  RESULTS: "results",
} as const;

export type TopicName = (typeof TOPICS)[keyof typeof TOPICS];

export function resolveTopicName(prefix: string, topic: TopicName): string {
  return `${prefix}.${topic}`;
}

/** Map event types to their target topics */
export function eventTypeToTopic(eventType: string): TopicName {
  if (eventType === "crawl.completed") return TOPICS.RESULTS;
  if (eventType.startsWith("task.")) return TOPICS.TASKS;
  return TOPICS.CRAWLS;
}
