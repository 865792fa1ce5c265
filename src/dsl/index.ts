export * from "./types.js";
export {
  crawlConfigSchema,
  DEFAULT_CRAWL_DEFAULTS,
  toValueSpec,
  type CrawlDefaults,
} from "./schema.js";
export { parseCrawlConfig } from "./parse.js";
