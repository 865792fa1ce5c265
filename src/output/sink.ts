import type { CrawlReport } from "../engine/scheduler/scheduler.js";
import type { LinkEntry } from "../links/link-queue.js";
import type { TreeMap } from "../scope/keypath.js";

export interface CrawlResult {
  crawlId: string;
  /** The result tree */
  data: TreeMap;
  /** Every link group, in capture order */
  links: Record<string, LinkEntry[]>;
  report: CrawlReport;
}

export interface OutputSink {
  /** Shown in the crawl summary, e.g. "JSON" */
  readonly name: string;
  /** Resolves to where the result went, or null when nothing was written. */
  write(result: CrawlResult): Promise<string | null>;
}
