export {
  initTracing,
  shutdownTracing,
  getTracer,
  startTaskSpan,
  startNodeSpan,
  endSpanOk,
  endSpanError,
} from "./tracer.js";

export {
  initMetrics,
  shutdownMetrics,
  noopMetrics,
} from "./metrics.js";

export type { TrawlMetrics } from "./metrics.js";

export {
  createLogger,
  PinoCrawlLogger,
  combineLoggers,
  formatDuration,
  formatBytes,
} from "./logger.js";

export type { CrawlLogger, CrawlStart, CrawlSummary } from "./logger.js";
