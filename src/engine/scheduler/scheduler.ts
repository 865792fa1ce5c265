import { nanoid } from "nanoid";
import pino from "pino";
import type { DriverFactory, PageDriver } from "../../driver/types.js";
import type { CrawlConfig, PageConfig } from "../../dsl/types.js";
import { toError } from "../../errors.js";
import type { LinkQueue } from "../../links/link-queue.js";
import type { UtilityRegistry } from "../../notation/utilities.js";
import type { Value } from "../../notation/values.js";
import type { TreeMap } from "../../scope/keypath.js";
import { VariableScope } from "../../scope/variables.js";
import type { CrawlLogger } from "../../observability/logger.js";
import { noopMetrics, type TrawlMetrics } from "../../observability/metrics.js";
import { endSpanError, endSpanOk, startTaskSpan } from "../../observability/tracer.js";
import { Interactor } from "../interactor/interactor.js";
import { Reconciler, type ReconcileResult } from "../reconciler/reconciler.js";

/** One page visit. */
export interface CrawlTask {
  id: string;
  url: string;
  /** Link metadata, bound as task variables */
  metadata: Record<string, Value>;
  page: PageConfig;
}

/** A `$name` page entry; expands into one task per link in the group. */
interface Reference {
  name: string;
  page: PageConfig;
  /** Entries of the group already turned into tasks */
  cursor: number;
}

type QueueItem = { kind: "task"; task: CrawlTask } | { kind: "reference"; ref: Reference };

export interface TaskReport {
  id: string;
  url: string;
  status: "Succeeded" | "Failed";
  error?: string;
  durationMs: number;
}

export interface CrawlReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  pagesOpened: number;
  maxConcurrentContexts: number;
  tasks: TaskReport[];
  succeeded: number;
  failed: number;
}

export interface SchedulerOptions<H> {
  factory: DriverFactory<H>;
  config: CrawlConfig;
  /** Shared result tree */
  tree: TreeMap;
  links: LinkQueue;
  utilities?: UtilityRegistry;
  logger?: pino.Logger;
  metrics?: TrawlMetrics;
  crawlLogger?: CrawlLogger;
}

/**
 * Runs crawl tasks on a pool of `race` workers. The queue is FIFO; link
 * group references expand when they reach the head and again after every
 * settled task, so links captured later in the crawl are still visited.
 * A failed task never stops the others.
 */
export class CrawlScheduler<H> {
  private queue: QueueItem[] = [];
  private activeReferences: Reference[] = [];
  private waiters: Array<() => void> = [];
  private reconciler = new Reconciler();
  private globals: VariableScope;
  private rootLogger: pino.Logger;
  private logger: pino.Logger;
  private metrics: TrawlMetrics;
  private reports: TaskReport[] = [];

  private inFlight = 0;
  private openContexts = 0;
  private maxOpenContexts = 0;
  private pagesOpened = 0;

  constructor(private readonly options: SchedulerOptions<H>) {
    this.rootLogger = options.logger ?? pino({ level: "info" });
    this.logger = this.rootLogger.child({ component: "trawl.scheduler" });
    this.metrics = options.metrics ?? noopMetrics();
    this.globals = VariableScope.root(options.config.vars);

    for (const page of options.config.pages) {
      for (const link of page.link) {
        this.queue.push(
          link.kind === "url"
            ? { kind: "task", task: this.createTask(link.url, link.metadata, page) }
            : { kind: "reference", ref: { name: link.name, page, cursor: 0 } },
        );
      }
    }
  }

  /** Seeds declared by the config (references count once). */
  get seedCount(): number {
    return this.queue.length;
  }

  async run(): Promise<CrawlReport> {
    const startedAt = new Date();
    const race = Math.max(1, this.options.config.race);
    this.logger.info({ race, seeds: this.queue.length }, "Scheduler started");

    await Promise.all(Array.from({ length: race }, () => this.worker()));

    const finishedAt = new Date();
    const counts = this.reconciler.counts();
    const report: CrawlReport = {
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      pagesOpened: this.pagesOpened,
      maxConcurrentContexts: this.maxOpenContexts,
      tasks: this.reports,
      succeeded: counts.Succeeded,
      failed: counts.Failed,
    };
    this.logger.info(
      { succeeded: report.succeeded, failed: report.failed, durationMs: report.durationMs },
      "Scheduler finished",
    );
    return report;
  }

  // ---------------------------------------------------------------------------
  // Queue
  // ---------------------------------------------------------------------------

  private async worker(): Promise<void> {
    for (;;) {
      const task = this.dequeue();

      if (task) {
        this.inFlight++;
        try {
          await this.execute(task);
        } finally {
          this.inFlight--;
          this.expandActiveReferences();
          this.notify();
        }
        continue;
      }

      if (this.inFlight === 0) {
        this.notify();
        return;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private dequeue(): CrawlTask | undefined {
    for (let item = this.queue.shift(); item; item = this.queue.shift()) {
      if (item.kind === "task") return item.task;

      const ref = item.ref;
      this.activeReferences.push(ref);
      const tasks = this.expand(ref);
      this.logger.debug({ group: ref.name, tasks: tasks.length }, "Link reference expanded");
      this.queue.unshift(...tasks.map((task): QueueItem => ({ kind: "task", task })));
    }
    return undefined;
  }

  private expand(ref: Reference): CrawlTask[] {
    const seeds = this.options.links.resolveReference(ref.name, ref.cursor);
    ref.cursor += seeds.length;
    return seeds.map((seed) => this.createTask(seed.url, seed.metadata, ref.page));
  }

  private expandActiveReferences(): void {
    for (const ref of this.activeReferences) {
      for (const task of this.expand(ref)) this.queue.push({ kind: "task", task });
    }
  }

  private notify(): void {
    for (const wake of this.waiters.splice(0)) wake();
  }

  private createTask(url: string, metadata: Record<string, Value>, page: PageConfig): CrawlTask {
    const task: CrawlTask = { id: nanoid(), url, metadata, page };
    this.reconciler.register(task.id, url);
    return task;
  }

  // ---------------------------------------------------------------------------
  // Task execution
  // ---------------------------------------------------------------------------

  private async execute(task: CrawlTask): Promise<void> {
    const { config, factory } = this.options;
    const started = Date.now();
    const { span, ctx } = startTaskSpan(task.url, task.id);
    let driver: PageDriver<H> | null = null;

    this.transition(this.reconciler.schedule(task.id));
    this.transition(this.reconciler.start(task.id));

    try {
      if (task.page.interact) {
        driver = await factory.open();
        this.contextOpened();
        await driver.navigate(task.url, config.browser.readyOn, config.browser.timeout);

        const vars = this.globals.task({ ...task.page.vars, ...task.metadata, _url: task.url });
        const interactor = new Interactor(driver, {
          tree: this.options.tree,
          links: this.options.links,
          timeout: config.browser.timeout,
          repeatTimeout: config.browser.repeatTimeout,
          keyMatch: config.keyMatch.create,
          utilities: this.options.utilities,
          logger: this.rootLogger,
          metrics: this.metrics,
          traceContext: ctx,
        });
        await interactor.run(task.page.interact, vars);
      } else {
        this.logger.debug({ url: task.url }, "Page has no interactions, not opened");
      }

      this.transition(this.reconciler.succeed(task.id));
      this.settle(task, "Succeeded", started);
      endSpanOk(span);
    } catch (err) {
      const error = toError(err);
      this.transition(this.reconciler.fail(task.id, error.message));
      this.settle(task, "Failed", started, error.message);
      endSpanError(span, error);
    } finally {
      if (driver) await this.release(driver, task);
    }
  }

  private async release(driver: PageDriver<H>, task: CrawlTask): Promise<void> {
    try {
      await driver.close();
    } catch (err) {
      this.logger.warn({ err, taskId: task.id, url: task.url }, "Failed to close page context");
    } finally {
      this.openContexts--;
      this.metrics.openContexts(-1);
    }
  }

  private contextOpened(): void {
    this.pagesOpened++;
    this.openContexts++;
    this.maxOpenContexts = Math.max(this.maxOpenContexts, this.openContexts);
    this.metrics.openContexts(1);
  }

  private settle(task: CrawlTask, status: TaskReport["status"], started: number, error?: string): void {
    const report: TaskReport = { id: task.id, url: task.url, status, durationMs: Date.now() - started };
    if (error !== undefined) report.error = error;
    this.reports.push(report);
    this.metrics.taskCount({ status });
  }

  private transition(result: ReconcileResult): void {
    this.options.crawlLogger?.taskTransition(result);
  }
}
