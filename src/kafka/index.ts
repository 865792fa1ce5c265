export { EventProducer, type ProducerClient } from "./producer.js";
export { KafkaCrawlLogger, createEvent } from "./events.js";
export { TOPICS, resolveTopicName, eventTypeToTopic, type TopicName } from "./topics.js";
