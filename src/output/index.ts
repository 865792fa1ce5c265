export type { CrawlResult, OutputSink } from "./sink.js";
export {
  JsonFileSink,
  jsonOutputPath,
  type JsonFileSinkOptions,
  type OutputTransform,
} from "./json-file.js";
export { KafkaSink } from "./kafka-sink.js";
