import { describe, it, expect } from "vitest";
import pino from "pino";
import { parseCrawlConfig } from "../../src/dsl/parse.js";
import type { InteractConfig } from "../../src/dsl/types.js";
import { Interactor, nodeName, pickMatches } from "../../src/engine/interactor/interactor.js";
import {
  ElementNotFoundError,
  TimeoutError,
  UndefinedVariableError,
} from "../../src/errors.js";
import { LinkQueue } from "../../src/links/link-queue.js";
import type { Value } from "../../src/notation/values.js";
import type { TreeMap } from "../../src/scope/keypath.js";
import { VariableScope } from "../../src/scope/variables.js";
import { DomDriver, type FixturePage } from "../support/dom-driver.js";

const PAGE_URL = "https://shop.test/";
const logger = pino({ level: "silent" });

function interactOf(raw: unknown): InteractConfig {
  const interact = parseCrawlConfig({ pages: [{ link: PAGE_URL, interact: raw }] }).pages[0].interact;
  if (!interact) throw new Error("no interact section");
  return interact;
}

interface SetupOptions {
  vars?: Record<string, Value>;
  repeatTimeout?: number;
}

async function setup(page: string | FixturePage, raw: unknown, options: SetupOptions = {}) {
  const driver = new DomDriver({ [PAGE_URL]: page });
  await driver.navigate(PAGE_URL, "load", 1000);
  const tree: TreeMap = {};
  const links = new LinkQueue(logger);
  const interactor = new Interactor(driver, {
    tree,
    links,
    timeout: 200,
    repeatTimeout: options.repeatTimeout ?? 1000,
    logger,
  });
  const vars = VariableScope.root().task({ ...options.vars, _url: PAGE_URL });
  return { driver, tree, links, run: () => interactor.run(interactOf(raw), vars) };
}

describe("Interactor", () => {
  describe("extraction", () => {
    it("writes an object read from the page", async () => {
      const { tree, run } = await setup('<h1>Title</h1><a href="/x">link</a>', {
        nodes: [
          {
            selector: "body",
            data: [{ scope: "data", value: { title: "$attr{text@h1}", link: "$attr{href@a}" } }],
          },
        ],
      });
      await run();
      expect(tree).toEqual({ data: { title: "Title", link: "/x" } });
    });

    it("appends one entry per element for all nodes", async () => {
      const { tree, run } = await setup("<ul><li>a</li><li>b</li><li>c</li></ul>", {
        nodes: [
          {
            selector: "li",
            all: true,
            data: [{ scope: "data.items", value: { text: "$attr{text}", nth: "$var{_nth}" } }],
          },
        ],
      });
      await run();
      expect(tree).toEqual({
        data: {
          items: [
            { text: "a", nth: 0 },
            { text: "b", nth: 1 },
            { text: "c", nth: 2 },
          ],
        },
      });
    });

    it("applies range bounds and step", async () => {
      const { tree, run } = await setup("<ul><li>a</li><li>b</li><li>c</li><li>d</li><li>e</li></ul>", {
        nodes: [
          { selector: "li", all: true, range: [1, "_", 2], data: [{ scope: "data.picked", value: "$attr{text}" }] },
          { selector: "li", range: [2], data: [{ scope: "data.third", value: "$attr{text}" }] },
        ],
      });
      await run();
      expect(tree).toEqual({ data: { picked: ["b", "d"], third: "c" } });
    });

    it("groups nested reads under keyed entries", async () => {
      const html = `
        <div class="product" data-sku="A1"><h2>Lamp</h2><span class="review">Good</span><span class="review">Bright</span></div>
        <div class="product" data-sku="B2"><h2>Desk</h2><span class="review">Solid</span></div>
      `;
      const { tree, run } = await setup(html, {
        nodes: [
          {
            selector: ".product",
            all: true,
            data: [
              {
                scope: "data.products.$key{sku=$var{sku}}",
                value: { sku: "$attr{data-sku>>sku}", name: "$attr{text@h2}" },
                mode: "merge",
              },
            ],
            interact: {
              nodes: [
                {
                  selector: ".review",
                  all: true,
                  data: [{ scope: "data.products.$key{sku=$var{sku}}.reviews", value: "$attr{text}" }],
                },
              ],
            },
          },
        ],
      });
      await run();
      expect(tree).toEqual({
        data: {
          products: [
            { sku: "A1", name: "Lamp", reviews: ["Good", "Bright"] },
            { sku: "B2", name: "Desk", reviews: ["Solid"] },
          ],
        },
      });
    });

    it("keeps captures local to the node unless the task declares them", async () => {
      const nodes = [
        { selector: "h1", data: [{ scope: "data.title", value: "$attr{text>>heading}" }] },
        { selector: "a", data: [{ scope: "data.heading", value: "$var{heading}" }] },
      ];

      const local = await setup('<h1>Title</h1><a href="/x">x</a>', { nodes });
      await expect(local.run()).rejects.toThrow(UndefinedVariableError);

      const promoted = await setup('<h1>Title</h1><a href="/x">x</a>', { nodes }, { vars: { heading: null } });
      await promoted.run();
      expect(promoted.tree).toEqual({ data: { title: "Title", heading: "Title" } });
    });
  });

  describe("selection", () => {
    it("runs the first alternative that matches", async () => {
      const { tree, run } = await setup('<p class="present">here</p>', {
        nodes: [
          [
            { selector: ".missing", data: [{ scope: "data.which", value: "missing" }] },
            { selector: ".present", data: [{ scope: "data.which", value: "present" }] },
          ],
        ],
      });
      await run();
      expect(tree).toEqual({ data: { which: "present" } });
    });

    it("skips optional nodes with no matches", async () => {
      const { tree, run } = await setup("<p>here</p>", {
        nodes: [{ selector: ".missing", data: [{ scope: "data.x", value: "x" }] }],
      });
      await run();
      expect(tree).toEqual({});
    });

    it("aborts on a required node with no matches", async () => {
      const { run } = await setup("<p>here</p>", { nodes: [{ selector: ".missing", required: true }] });
      await expect(run()).rejects.toThrow(ElementNotFoundError);
      await expect(run()).rejects.toThrow("Element not found: .missing");
    });

    it("filters matches by text", async () => {
      const { tree, run } = await setup("<ul><li>Apple</li><li>Banana</li><li>Apricot</li></ul>", {
        nodes: [
          { selector: "li", all: true, contains: "Ap", excludes: "cot", data: [{ scope: "data.kept", value: "$attr{text}" }] },
        ],
      });
      await run();
      expect(tree).toEqual({ data: { kept: ["Apple"] } });
    });

    it("times out waiting for a node that never appears", async () => {
      const { run } = await setup("<p>here</p>", { nodes: [{ selector: ".never", wait: 50 }] });
      await expect(run()).rejects.toThrow(TimeoutError);
      await expect(run()).rejects.toThrow('Timed out after 50ms waiting for ".never"');
    });

    it("scrolls shown nodes into view", async () => {
      const { driver, run } = await setup("<p>a</p><p>b</p>", { nodes: [{ selector: "p", all: true, show: true }] });
      await run();
      expect(driver.scrolled.map((el) => el.textContent)).toEqual(["a", "b"]);
    });
  });

  describe("actions", () => {
    it("types evaluated values and takes screenshots after acting", async () => {
      const { driver, run } = await setup(
        "<input>",
        {
          nodes: [
            {
              name: "search",
              selector: "input",
              actions: [{ type: "type", value: "$var{query} shoes", screenshot: "shots/$var{_node}-$var{_nth}.png" }],
            },
          ],
        },
        { vars: { query: "red" } },
      );
      await run();
      expect(driver.actions).toEqual([{ type: "type", tag: "input", text: "", value: "red shoes" }]);
      expect(driver.screenshots).toEqual(["shots/search-0.png"]);
    });

    it("repeats an action the number of times its count template gives", async () => {
      const { driver, run } = await setup('<button data-times="2">Go</button>', {
        nodes: [{ selector: "button", actions: [{ type: "click", count: "$attr{data-times}" }] }],
      });
      await run();
      expect(driver.actions.map((a) => a.type)).toEqual(["click", "click"]);
    });
  });

  describe("links", () => {
    it("captures deduplicated absolute links with metadata", async () => {
      const html = '<a class="p" href="/p/1">One</a><a class="p" href="/p/2#x">Two</a><a class="p" href="/p/1">Again</a>';
      const { links, run } = await setup(html, {
        nodes: [
          {
            selector: "a.p",
            all: true,
            links: [{ name: "products", url: "$attr{href}", metadata: { title: "$attr{text}" } }],
          },
        ],
      });
      await run();
      expect(links.resolveReference("products")).toEqual([
        { url: "https://shop.test/p/1", metadata: { title: "One" } },
        { url: "https://shop.test/p/2", metadata: { title: "Two" } },
      ]);
    });

    it("captures one link per item when the url reads a list", async () => {
      const html = '<div id="l"><a href="/p/1">One</a><a href="/p/2">Two</a><a href="/p/1">Again</a></div>';
      const { links, run } = await setup(html, {
        nodes: [
          {
            selector: "#l",
            links: [{ name: "products", url: "$attr{href<parent.all>@a}", metadata: { from: "listing" } }],
          },
        ],
      });
      await run();
      expect(links.size("products")).toBe(2);
      expect(links.resolveReference("products")).toEqual([
        { url: "https://shop.test/p/1", metadata: { from: "listing" } },
        { url: "https://shop.test/p/2", metadata: { from: "listing" } },
      ]);
    });
  });

  describe("repeat", () => {
    it("runs a counted repeat exactly n times", async () => {
      const { driver, run } = await setup("<button>More</button>", {
        repeat: 3,
        nodes: [{ selector: "button", actions: [{ type: "click" }] }],
      });
      await run();
      expect(driver.actions).toHaveLength(3);
    });

    it("repeats while the condition holds", async () => {
      const page: FixturePage = {
        html: '<ul><li class="item">1</li></ul><button>More</button>',
        onAction: (_action, _element, document) => {
          const item = document.createElement("li");
          item.className = "item";
          document.querySelector("ul")?.appendChild(item);
        },
      };
      const { driver, run } = await setup(page, {
        repeat: [{ value: "$attr{count@.item}", while: ["less_than", 3] }],
        nodes: [{ selector: "button", actions: [{ type: "click" }] }],
      });
      await run();
      expect(driver.actions).toHaveLength(2);
      expect(await driver.query(".item", null)).toHaveLength(3);
    });

    it("uses the condition default when its element is missing", async () => {
      const { driver, run } = await setup("<button>More</button>", {
        repeat: [{ value: "$attr{text@.next}", while: ["=", "more"], default: "done" }],
        nodes: [{ selector: "button", actions: [{ type: "click" }] }],
      });
      await run();
      expect(driver.actions).toHaveLength(1);
    });

    it("gives up on a loop that outlives the repeat timeout", async () => {
      const { run } = await setup(
        "<button>More</button>",
        {
          repeat: [{ value: "$attr{count@button}", while: [">", 0] }],
          nodes: [{ selector: "button", actions: [{ type: "click", wait: 20 }] }],
        },
        { repeatTimeout: 30 },
      );
      await expect(run()).rejects.toThrow(TimeoutError);
    });

    it("reads nested repeat conditions from the whole page", async () => {
      const page: FixturePage = {
        html: '<p class="state">2</p><div id="s"><button>Go</button></div>',
        onAction: (_action, _element, document) => {
          const state = document.querySelector(".state");
          if (state) state.textContent = String(Number(state.textContent) - 1);
        },
      };
      const { driver, run } = await setup(page, {
        nodes: [
          {
            selector: "#s",
            interact: {
              repeat: [{ value: "$attr{text@.state}", while: [">", 0] }],
              nodes: [{ selector: "button", actions: [{ type: "click" }] }],
            },
          },
        ],
      });
      await run();
      expect(driver.actions).toHaveLength(2);
      expect((await driver.query(".state", null))[0].textContent).toBe("0");
    });
  });
});

describe("pickMatches", () => {
  const found = ["a", "b", "c", "d", "e"];

  it("keeps only the first match unless all", () => {
    expect(pickMatches(found, undefined, false)).toEqual([{ element: "a", nth: 0 }]);
  });

  it("counts negative bounds from the end", () => {
    expect(pickMatches(found, { start: -2, step: 1 }, true)).toEqual([
      { element: "d", nth: 0 },
      { element: "e", nth: 1 },
    ]);
  });

  it("returns nothing for an empty range", () => {
    expect(pickMatches(found, { start: 3, stop: 1, step: 1 }, true)).toEqual([]);
  });
});

describe("nodeName", () => {
  it("prefers the name and replaces colons", () => {
    expect(nodeName({ selector: "li:first-child", all: false, show: false, required: false, actions: [], links: [], data: [] })).toBe(
      "li-first-child",
    );
  });
});
