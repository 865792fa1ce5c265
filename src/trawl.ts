import { nanoid } from "nanoid";
import type pino from "pino";
import { defaultConfig } from "../config/default.js";
import { PlaywrightDriverFactory, type Handle } from "./driver/playwright.js";
import type { DriverFactory } from "./driver/types.js";
import { parseCrawlConfig } from "./dsl/parse.js";
import type { BrowserOptions, CrawlConfig } from "./dsl/types.js";
import { CrawlScheduler } from "./engine/scheduler/scheduler.js";
import { toError } from "./errors.js";
import { KafkaCrawlLogger } from "./kafka/events.js";
import { EventProducer, type ProducerClient } from "./kafka/producer.js";
import { LinkQueue } from "./links/link-queue.js";
import type { UtilityRegistry } from "./notation/utilities.js";
import {
  combineLoggers,
  createLogger,
  initMetrics,
  initTracing,
  PinoCrawlLogger,
  shutdownMetrics,
  shutdownTracing,
  type CrawlLogger,
} from "./observability/index.js";
import { JsonFileSink, jsonOutputPath, type OutputTransform } from "./output/json-file.js";
import { KafkaSink } from "./output/kafka-sink.js";
import type { CrawlResult, OutputSink } from "./output/sink.js";
import type { TreeMap } from "./scope/keypath.js";
import type { TrawlConfig } from "./types/index.js";

/** Builds the driver factory once the crawl's browser options are known. */
export type DriverProvider<H> = (browser: BrowserOptions, logger: pino.Logger) => DriverFactory<H>;

export const playwrightDriver: DriverProvider<Handle> = (browser, logger) =>
  new PlaywrightDriverFactory(browser, logger);

export interface TrawlOptions<H> {
  driver: DriverProvider<H>;
  /** Runtime configuration; read from the environment when omitted */
  config?: TrawlConfig;
  /** Sinks in addition to the ones the crawl's `output` section asks for */
  sinks?: OutputSink[];
  /** Applied to the JSON file output */
  transform?: OutputTransform;
  utilities?: UtilityRegistry;
  logger?: pino.Logger;
  /** Kafka client override; a real kafkajs producer is created otherwise */
  producerClient?: ProducerClient;
}

/**
 * Top-level facade.
 *
 * Usage:
 *   const trawl = new Trawl(definition, { driver: playwrightDriver });
 *   const { data, links, report } = await trawl.run();
 *
 * The constructor validates the definition and throws
 * ConfigValidationError before anything is opened.
 */
export class Trawl<H> {
  readonly crawlId = nanoid();
  readonly crawl: CrawlConfig;
  private runtime: TrawlConfig;
  private logger: pino.Logger;
  private producer: EventProducer | null;

  constructor(
    definition: unknown,
    private readonly options: TrawlOptions<H>,
  ) {
    this.runtime = options.config ?? defaultConfig;
    this.logger = options.logger ?? createLogger(this.runtime.logLevel);
    this.crawl = parseCrawlConfig(definition, this.runtime.crawl);
    this.producer = this.runtime.kafka
      ? new EventProducer(this.runtime.kafka, this.logger, undefined, options.producerClient)
      : null;
  }

  /**
   * Crawl every page. Task failures are recorded in the report; the promise
   * rejects only when the browser cannot be started.
   */
  async run(): Promise<CrawlResult> {
    const started = Date.now();
    initTracing(this.runtime.observability);
    const metrics = initMetrics(this.runtime.observability);

    const factory = this.options.driver(this.crawl.browser, this.logger);
    const crawlLogger = this.createCrawlLogger();
    const tree: TreeMap = {};
    const links = new LinkQueue(this.logger);

    try {
      if (this.producer) await this.producer.connect();
      await factory.start();

      const scheduler = new CrawlScheduler({
        factory,
        config: this.crawl,
        tree,
        links,
        utilities: this.options.utilities,
        logger: this.logger,
        metrics,
        crawlLogger,
      });

      crawlLogger.crawlStarted({
        crawlId: this.crawlId,
        seeds: scheduler.seedCount,
        race: this.crawl.race,
        mode: factory.mode,
      });

      const report = await scheduler.run();
      const result: CrawlResult = { crawlId: this.crawlId, data: tree, links: links.toJSON(), report };
      const outputs = await this.writeOutputs(result, crawlLogger);

      crawlLogger.crawlFinished({
        crawlId: this.crawlId,
        pages: report.pagesOpened,
        succeeded: report.succeeded,
        failed: report.failed,
        mode: factory.mode,
        durationMs: Date.now() - started,
        dataBytes: Buffer.byteLength(JSON.stringify(tree)),
        links: links.totalCount,
        outputs,
      });
      return result;
    } finally {
      await factory.close();
      if (this.producer) await this.producer.disconnect();
      await shutdownMetrics();
      await shutdownTracing();
    }
  }

  private createCrawlLogger(): CrawlLogger {
    const pinoLogger = new PinoCrawlLogger(this.logger);
    return this.producer
      ? combineLoggers(pinoLogger, new KafkaCrawlLogger(this.producer, this.crawlId))
      : pinoLogger;
  }

  private sinks(): OutputSink[] {
    const { output } = this.crawl;
    const sinks: OutputSink[] = [];

    for (const format of output.formats) {
      switch (format) {
        case "json":
          sinks.push(
            new JsonFileSink(
              { path: jsonOutputPath(output.path, output.name), transform: this.options.transform },
              this.logger,
            ),
          );
          break;
      }
    }

    if (this.producer && this.runtime.kafka) {
      sinks.push(new KafkaSink(this.producer, this.runtime.kafka.topicPrefix));
    }
    return [...sinks, ...(this.options.sinks ?? [])];
  }

  /** Write to every sink; a failing sink is logged and skipped. */
  private async writeOutputs(result: CrawlResult, crawlLogger: CrawlLogger): Promise<string[]> {
    const outputs: string[] = [];
    for (const sink of this.sinks()) {
      try {
        const location = await sink.write(result);
        outputs.push(location ? `${sink.name} ${location}` : sink.name);
      } catch (err) {
        crawlLogger.error("Output failed", { sink: sink.name, error: toError(err).message });
      }
    }
    return outputs;
  }
}
