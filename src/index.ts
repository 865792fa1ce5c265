// Trawl: declarative browser crawling
// ===================================
//
// A crawl definition lists pages and, for each, a tree of nodes to select,
// act on and extract from. Extracted values land in one shared result tree
// at paths such as `data.products.$key{sku=$var{sku}}.reviews`; discovered
// links feed named groups that later pages crawl through `$group`.
//
//   ┌──────────────┐   tasks   ┌───────────────┐  page   ┌──────────────┐
//   │ CrawlScheduler│ ───────→ │  Interactor   │ ──────→ │  PageDriver  │
//   │  (race pool)  │ ←─────── │ (node walker) │         │ (Playwright) │
//   └──────┬───────┘  $group   └──┬─────────┬──┘         └──────────────┘
//          │                     │         │
//          ↓                     ↓         ↓
//   ┌──────────────┐      ┌───────────┐ ┌──────────────┐
//   │  LinkQueue   │ ←─── │ notation  │ │ result tree  │
//   └──────────────┘      └───────────┘ └──────┬───────┘
//                                              ↓
//                                   JSON file / Kafka sinks
//

export { Trawl, playwrightDriver } from "./trawl.js";
export type { DriverProvider, TrawlOptions } from "./trawl.js";

// Types
export type {
  TrawlConfig,
  TrawlEvent,
  TrawlEventType,
  KafkaConfig,
  ObservabilityConfig,
  LogLevel,
} from "./types/index.js";
export * from "./dsl/index.js";
export * from "./errors.js";

// Engine
export * from "./engine/index.js";
export * from "./driver/index.js";
export * from "./notation/index.js";
export * from "./scope/index.js";
export { LinkQueue, normalizeUrl, type LinkEntry, type TaskSeed } from "./links/link-queue.js";

// Output
export * from "./output/index.js";

// Kafka
export * from "./kafka/index.js";

// Observability
export * from "./observability/index.js";
