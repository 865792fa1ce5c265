import { setTimeout as sleep } from "node:timers/promises";
import { JSDOM } from "jsdom";
import { DriverError } from "../../src/errors.js";
import type {
  DriverAction,
  DriverFactory,
  PageDriver,
  QueryFilter,
  ReadyState,
  WaitCondition,
} from "../../src/driver/types.js";

/** Reacts to a performed action, e.g. by changing the document. */
export type ActionHook = (action: DriverAction, element: Element, document: Document) => void;

export interface FixturePage {
  html: string;
  onAction?: ActionHook;
}

export type FixturePages = Record<string, string | FixturePage>;

export interface RecordedAction {
  type: DriverAction["type"];
  tag: string;
  text: string;
  value?: string;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function isParentNode(node: Node): node is Node & ParentNode {
  return node.nodeType === 1 || node.nodeType === 9 || node.nodeType === 11;
}

/** Page driver over a jsdom document. Handles are DOM nodes. */
export class DomDriver implements PageDriver<Node> {
  readonly actions: RecordedAction[] = [];
  readonly screenshots: string[] = [];
  readonly scrolled: Element[] = [];
  private dom: JSDOM | null = null;
  private page: FixturePage | null = null;
  private currentUrl = "about:blank";
  private closed = false;

  constructor(
    private readonly pages: FixturePages,
    private readonly navigateDelayMs = 0,
    private readonly onClose: () => void = () => {},
  ) {}

  get document(): Document {
    if (!this.dom) throw new DriverError("No page loaded");
    return this.dom.window.document;
  }

  async navigate(url: string, _readyOn: ReadyState, _timeoutMs: number): Promise<void> {
    if (this.navigateDelayMs > 0) await sleep(this.navigateDelayMs);
    const page = this.pages[url];
    if (page === undefined) throw new DriverError(`navigate to ${url} failed: no fixture`);

    this.page = typeof page === "string" ? { html: page } : page;
    this.dom = new JSDOM(this.page.html, { url });
    this.currentUrl = url;
  }

  async query(selector: string, scope: Node | null, filter: QueryFilter = {}): Promise<Node[]> {
    const root: Node = scope ?? this.document;
    if (selector === ":root" && scope === null) return [this.document.documentElement];
    if (!isParentNode(root)) return [];

    return Array.from(root.querySelectorAll(selector)).filter((el) => {
      const text = el.textContent ?? "";
      if (filter.hasText !== undefined && !text.includes(filter.hasText)) return false;
      if (filter.hasNotText !== undefined && text.includes(filter.hasNotText)) return false;
      return true;
    });
  }

  async getAttribute(handle: Node, name: string): Promise<string | null> {
    return isElement(handle) ? handle.getAttribute(name) : null;
  }

  async getText(handle: Node): Promise<string | null> {
    return handle.textContent;
  }

  async isDisabled(handle: Node): Promise<boolean> {
    return isElement(handle) && handle.hasAttribute("disabled");
  }

  async getChild(handle: Node, n: number): Promise<Node | null> {
    const children = handle.childNodes;
    return n >= 1 && n <= children.length ? children[n - 1] : null;
  }

  async performAction(handle: Node, action: DriverAction): Promise<void> {
    if (!isElement(handle)) throw new DriverError(`Cannot ${action.type} a non-element node`);

    const recorded: RecordedAction = {
      type: action.type,
      tag: handle.tagName.toLowerCase(),
      text: (handle.textContent ?? "").trim(),
    };
    if (action.value !== undefined) recorded.value = action.value;
    this.actions.push(recorded);

    this.page?.onAction?.(action, handle, this.document);
  }

  async scrollIntoView(handle: Node): Promise<void> {
    if (isElement(handle)) this.scrolled.push(handle);
  }

  async screenshot(path: string): Promise<void> {
    this.screenshots.push(path);
  }

  async waitFor(condition: WaitCondition<Node>, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if ((await this.query(condition.selector, condition.scope)).length > 0) return true;
      if (Date.now() >= deadline) return false;
      await sleep(5);
    }
  }

  url(): string {
    return this.currentUrl;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.dom?.window.close();
    this.onClose();
  }
}

export interface DomDriverFactoryOptions {
  navigateDelayMs?: number;
  /** Makes start() reject, as a failed browser launch would */
  startError?: Error;
}

/** Hands out DomDrivers and tracks how many are open at once. */
export class DomDriverFactory implements DriverFactory<Node> {
  readonly mode = "static";
  readonly drivers: DomDriver[] = [];
  openCount = 0;
  maxOpen = 0;
  closed = false;

  constructor(
    private readonly pages: FixturePages,
    private readonly options: DomDriverFactoryOptions = {},
  ) {}

  async start(): Promise<void> {
    if (this.options.startError) throw this.options.startError;
  }

  async open(): Promise<DomDriver> {
    this.openCount++;
    this.maxOpen = Math.max(this.maxOpen, this.openCount);
    const driver = new DomDriver(this.pages, this.options.navigateDelayMs ?? 0, () => {
      this.openCount--;
    });
    this.drivers.push(driver);
    return driver;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** URLs visited, in navigation order. */
  get visited(): string[] {
    return this.drivers.map((d) => d.url());
  }
}
