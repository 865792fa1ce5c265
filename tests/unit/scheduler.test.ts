import { describe, it, expect } from "vitest";
import pino from "pino";
import { parseCrawlConfig } from "../../src/dsl/parse.js";
import { CrawlScheduler } from "../../src/engine/scheduler/scheduler.js";
import type { ReconcileResult } from "../../src/engine/reconciler/reconciler.js";
import { LinkQueue } from "../../src/links/link-queue.js";
import type { CrawlLogger } from "../../src/observability/logger.js";
import { isTreeMap, type TreeMap } from "../../src/scope/keypath.js";
import { DomDriverFactory, type FixturePages } from "../support/dom-driver.js";

const logger = pino({ level: "silent" });

function schedulerFor(definition: unknown, pages: FixturePages, crawlLogger?: CrawlLogger) {
  const factory = new DomDriverFactory(pages, { navigateDelayMs: 10 });
  const tree: TreeMap = {};
  const links = new LinkQueue(logger);
  const scheduler = new CrawlScheduler({
    factory,
    config: parseCrawlConfig(definition),
    tree,
    links,
    logger,
    crawlLogger,
  });
  return { factory, tree, links, scheduler };
}

const titleNode = { selector: "h1", data: [{ scope: "data.titles", value: "$attr{text}", mode: "append" }] };

describe("CrawlScheduler", () => {
  it("never opens more page contexts than race allows", async () => {
    const pages: FixturePages = {};
    const urls: string[] = [];
    for (let i = 0; i < 10; i++) {
      const url = `https://shop.test/p/${i}`;
      pages[url] = `<h1>Page ${i}</h1>`;
      urls.push(url);
    }

    const { factory, tree, scheduler } = schedulerFor(
      { race: 2, pages: [{ link: urls, interact: { nodes: [titleNode] } }] },
      pages,
    );
    const report = await scheduler.run();

    expect(report.succeeded).toBe(10);
    expect(report.failed).toBe(0);
    expect(report.pagesOpened).toBe(10);
    expect(report.maxConcurrentContexts).toBe(2);
    expect(factory.maxOpen).toBe(2);
    expect(factory.openCount).toBe(0);

    const data = tree.data;
    const titles = isTreeMap(data) ? data.titles : undefined;
    expect(Array.isArray(titles) ? [...titles].sort() : titles).toEqual(
      Array.from({ length: 10 }, (_, i) => `Page ${i}`).sort(),
    );
  });

  it("crawls captured links through a group reference, with their metadata", async () => {
    const pages: FixturePages = {
      "https://shop.test/list": '<a class="p" href="/p/1">First</a><a class="p" href="/p/2">Second</a>',
      "https://shop.test/p/1": "<h1>Lamp</h1>",
      "https://shop.test/p/2": "<h1>Desk</h1>",
    };
    const { factory, tree, scheduler } = schedulerFor(
      {
        pages: [
          {
            link: "https://shop.test/list",
            interact: {
              nodes: [{ selector: "a.p", all: true, links: [{ name: "products", url: "$attr{href}", metadata: { label: "$attr{text}" } }] }],
            },
          },
          {
            link: "$products",
            interact: {
              nodes: [
                { selector: "h1", data: [{ scope: "data.products", value: { name: "$attr{text}", label: "$var{label}", url: "$var{_url}" }, mode: "append" }] },
              ],
            },
          },
        ],
      },
      pages,
    );

    const report = await scheduler.run();

    expect(report.succeeded).toBe(3);
    expect(factory.visited).toEqual(["https://shop.test/list", "https://shop.test/p/1", "https://shop.test/p/2"]);
    expect(tree).toEqual({
      data: {
        products: [
          { name: "Lamp", label: "First", url: "https://shop.test/p/1" },
          { name: "Desk", label: "Second", url: "https://shop.test/p/2" },
        ],
      },
    });
  });

  it("picks up links captured after their reference was reached", async () => {
    const pages: FixturePages = {
      "https://shop.test/list": '<a class="p" href="/p/1">First</a><a class="p" href="/p/2">Second</a>',
      "https://shop.test/p/1": "<h1>Lamp</h1>",
      "https://shop.test/p/2": "<h1>Desk</h1>",
    };
    const { factory, scheduler } = schedulerFor(
      {
        race: 2,
        pages: [
          { link: "https://shop.test/list", interact: { nodes: [{ selector: "a.p", all: true, links: [{ name: "products", url: "$attr{href}" }] }] } },
          { link: "$products", interact: { nodes: [titleNode] } },
        ],
      },
      pages,
    );

    const report = await scheduler.run();

    expect(report.succeeded).toBe(3);
    expect([...factory.visited].sort()).toEqual([
      "https://shop.test/list",
      "https://shop.test/p/1",
      "https://shop.test/p/2",
    ]);
  });

  it("records failures without stopping other tasks", async () => {
    const pages: FixturePages = {
      "https://shop.test/ok": "<h1>Fine</h1>",
      "https://shop.test/broken": "<p>no heading</p>",
    };
    const { factory, tree, scheduler } = schedulerFor(
      {
        race: 2,
        pages: [
          {
            link: ["https://shop.test/missing", "https://shop.test/broken", "https://shop.test/ok"],
            interact: { nodes: [{ ...titleNode, required: true }] },
          },
        ],
      },
      pages,
    );

    const report = await scheduler.run();

    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(2);
    expect(tree).toEqual({ data: { titles: ["Fine"] } });
    expect(factory.openCount).toBe(0);

    const errors = Object.fromEntries(report.tasks.map((t) => [t.url, t.error]));
    expect(errors).toEqual({
      "https://shop.test/missing": "navigate to https://shop.test/missing failed: no fixture",
      "https://shop.test/broken": "Element not found: h1",
      "https://shop.test/ok": undefined,
    });
  });

  it("does not open pages without interactions", async () => {
    const { factory, scheduler } = schedulerFor({ pages: [{ link: "https://shop.test/none" }] }, {});
    const report = await scheduler.run();

    expect(report.succeeded).toBe(1);
    expect(report.pagesOpened).toBe(0);
    expect(factory.drivers).toHaveLength(0);
  });

  it("exposes global and page variables to every task", async () => {
    const { tree, scheduler } = schedulerFor(
      {
        vars: { site: "shop" },
        pages: [
          {
            link: { url: "https://shop.test/a", metadata: { rank: 1 } },
            vars: { section: "home" },
            interact: { nodes: [{ selector: "h1", data: [{ scope: "data", value: { site: "$var{site}", section: "$var{section}", rank: "$var{rank}" } }] }] },
          },
        ],
      },
      { "https://shop.test/a": "<h1>A</h1>" },
    );

    await scheduler.run();
    expect(tree).toEqual({ data: { site: "shop", section: "home", rank: 1 } });
  });

  it("reports every task transition", async () => {
    const transitions: string[] = [];
    const recorder: CrawlLogger = {
      crawlStarted: () => {},
      taskTransition: (result: ReconcileResult) => transitions.push(`${result.previous}->${result.current}`),
      crawlFinished: () => {},
      error: () => {},
    };
    const { scheduler } = schedulerFor(
      { pages: [{ link: "https://shop.test/a", interact: { nodes: [titleNode] } }] },
      { "https://shop.test/a": "<h1>A</h1>" },
      recorder,
    );

    expect(scheduler.seedCount).toBe(1);
    await scheduler.run();
    expect(transitions).toEqual(["Pending->Scheduled", "Scheduled->Running", "Running->Succeeded"]);
  });
});
