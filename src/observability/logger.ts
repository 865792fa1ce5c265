import pino from "pino";
import type { ReconcileResult } from "../engine/reconciler/index.js";
import type { LogLevel } from "../types/index.js";

export function createLogger(level: LogLevel = "info"): pino.Logger {
  return pino({ level });
}

export interface CrawlStart {
  crawlId: string;
  seeds: number;
  race: number;
  mode: string;
}

/** Figures reported once a crawl has finished and its outputs are written. */
export interface CrawlSummary {
  crawlId: string;
  pages: number;
  succeeded: number;
  failed: number;
  mode: string;
  durationMs: number;
  /** Serialized size of the result tree */
  dataBytes: number;
  links: number;
  outputs: string[];
}

/** Workflow-level crawl events. */
export interface CrawlLogger {
  crawlStarted(info: CrawlStart): void;
  taskTransition(result: ReconcileResult): void;
  crawlFinished(summary: CrawlSummary): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export class PinoCrawlLogger implements CrawlLogger {
  private logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = (logger ?? createLogger()).child({ component: "trawl.crawl" });
  }

  crawlStarted(info: CrawlStart): void {
    this.logger.info(info, "Crawl started");
  }

  taskTransition(result: ReconcileResult): void {
    const fields = { taskId: result.taskId, url: result.url, from: result.previous, to: result.current };
    if (result.error !== undefined) {
      this.logger.warn({ ...fields, error: result.error }, `Task ${result.current}`);
    } else {
      this.logger.debug(fields, `Task ${result.current}`);
    }
  }

  crawlFinished(summary: CrawlSummary): void {
    this.logger.info(
      {
        crawlId: summary.crawlId,
        pages: summary.pages,
        succeeded: summary.succeeded,
        failed: summary.failed,
        mode: summary.mode,
        duration: formatDuration(summary.durationMs),
        size: formatBytes(summary.dataBytes),
        links: summary.links,
        outputs: summary.outputs,
      },
      "Crawl finished",
    );
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.logger.error(context ?? {}, message);
  }
}

/** Fan every event out to several loggers. */
export function combineLoggers(...loggers: CrawlLogger[]): CrawlLogger {
  return {
    crawlStarted: (info) => loggers.forEach((l) => l.crawlStarted(info)),
    taskTransition: (result) => loggers.forEach((l) => l.taskTransition(result)),
    crawlFinished: (summary) => loggers.forEach((l) => l.crawlFinished(summary)),
    error: (message, context) => loggers.forEach((l) => l.error(message, context)),
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
