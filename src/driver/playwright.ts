import pino from "pino";
import {
  chromium,
  errors,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserType as PlaywrightBrowserType,
  type ElementHandle,
  type Page,
} from "playwright-core";
import { DriverError, TimeoutError, toError } from "../errors.js";
import type { BrowserOptions } from "../dsl/types.js";
import type {
  DriverAction,
  DriverFactory,
  PageDriver,
  QueryFilter,
  ReadyState,
  WaitCondition,
} from "./types.js";

export type Handle = ElementHandle<Node>;

const SWIPE_STEPS = 10;

const LAUNCHERS: Record<BrowserOptions["type"], PlaywrightBrowserType> = {
  chromium,
  firefox,
  webkit,
};

/**
 * A single Playwright page inside its own browser context. Playwright
 * failures surface as TimeoutError or DriverError.
 */
export class PlaywrightDriver implements PageDriver<Handle> {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  async query(selector: string, scope: Handle | null, filter: QueryFilter = {}): Promise<Handle[]> {
    const matches: Handle[] = await guard(`query "${selector}"`, () =>
      scope ? scope.$$(selector) : this.page.$$(selector),
    );
    if (filter.hasText === undefined && filter.hasNotText === undefined) return matches;

    const kept: Handle[] = [];
    for (const match of matches) {
      const text = (await this.getText(match)) ?? "";
      if (filter.hasText !== undefined && !text.includes(filter.hasText)) continue;
      if (filter.hasNotText !== undefined && text.includes(filter.hasNotText)) continue;
      kept.push(match);
    }
    return kept;
  }

  getAttribute(handle: Handle, name: string): Promise<string | null> {
    return guard(`read attribute "${name}"`, () =>
      handle.evaluate(
        (node, attr) => (node instanceof Element ? node.getAttribute(attr) : null),
        name,
      ),
    );
  }

  getText(handle: Handle): Promise<string | null> {
    return guard("read text", () => handle.evaluate((node) => node.textContent));
  }

  isDisabled(handle: Handle): Promise<boolean> {
    return guard("read disabled state", () =>
      handle.evaluate((node) => node instanceof Element && node.hasAttribute("disabled")),
    );
  }

  async getChild(handle: Handle, n: number): Promise<Handle | null> {
    return guard(`read child ${n}`, async () => {
      const count = await handle.evaluate((node) => node.childNodes.length);
      if (n < 1 || n > count) return null;
      const child = await handle.evaluateHandle((node, i) => node.childNodes[i - 1], n);
      return child.asElement();
    });
  }

  async performAction(handle: Handle, action: DriverAction): Promise<void> {
    await guard(action.type, async () => {
      if (action.dispatch && action.type !== "swipe_left" && action.type !== "swipe_right") {
        await handle.dispatchEvent(action.type);
        return;
      }

      const clickOptions = { button: action.button, modifiers: action.modifiers };
      switch (action.type) {
        case "click":
          await handle.click(clickOptions);
          return;
        case "dblclick":
          await handle.dblclick(clickOptions);
          return;
        case "hover":
          await handle.hover({ modifiers: action.modifiers });
          return;
        case "focus":
          await handle.focus();
          return;
        case "type":
          await handle.fill(action.value ?? "");
          return;
        case "press":
          await handle.press(action.key ?? "Enter");
          return;
        case "check":
          await handle.check();
          return;
        case "uncheck":
          await handle.uncheck();
          return;
        case "swipe_left":
        case "swipe_right":
          await this.swipe(handle, action.type === "swipe_left" ? -1 : 1);
          return;
        case "scroll":
          await handle.evaluate((node) => {
            if (node instanceof Element) node.scrollTop += node.clientHeight;
          });
          return;
      }
    });
  }

  scrollIntoView(handle: Handle): Promise<void> {
    return guard("scroll into view", async () => {
      await handle.scrollIntoViewIfNeeded();
    });
  }

  screenshot(path: string): Promise<void> {
    return guard(`screenshot ${path}`, async () => {
      await this.page.screenshot({ path, fullPage: true });
    });
  }

  async waitFor(condition: WaitCondition<Handle>, timeoutMs: number): Promise<boolean> {
    try {
      if (condition.scope) {
        await condition.scope.waitForSelector(condition.selector, { timeout: timeoutMs });
      } else {
        await this.page.waitForSelector(condition.selector, { timeout: timeoutMs });
      }
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw new DriverError(`wait for "${condition.selector}" failed`, { cause: err });
    }
  }

  navigate(url: string, readyOn: ReadyState, timeoutMs: number): Promise<void> {
    return guard(`navigate to ${url}`, async () => {
      await this.page.goto(url, { waitUntil: readyOn, timeout: timeoutMs });
    });
  }

  url(): string {
    return this.page.url();
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  private async swipe(element: Handle, direction: -1 | 1): Promise<void> {
    const box = await element.boundingBox();
    if (!box) throw new DriverError("Cannot swipe an element that is not visible");

    const y = box.y + box.height / 2;
    const from = direction < 0 ? box.x + box.width * 0.9 : box.x + box.width * 0.1;
    const to = direction < 0 ? box.x + box.width * 0.1 : box.x + box.width * 0.9;

    await this.page.mouse.move(from, y);
    await this.page.mouse.down();
    await this.page.mouse.move(to, y, { steps: SWIPE_STEPS });
    await this.page.mouse.up();
  }
}

/**
 * Launches one browser lazily and opens a fresh browser context per task.
 */
export class PlaywrightDriverFactory implements DriverFactory<Handle> {
  readonly mode: string;
  private browser: Promise<Browser> | null = null;
  private logger: pino.Logger;

  constructor(
    private readonly options: BrowserOptions,
    logger?: pino.Logger,
  ) {
    this.mode = options.show ? "visible" : "headless";
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "trawl.driver" });
  }

  async start(): Promise<void> {
    await this.launch();
  }

  async open(): Promise<PageDriver<Handle>> {
    const browser = await this.launch();
    const viewport = this.options.viewport;
    const context = await guard("open browser context", () =>
      browser.newContext(viewport ? { viewport: { width: viewport[0], height: viewport[1] } } : {}),
    );
    context.setDefaultTimeout(this.options.timeout);
    const page = await guard("open page", () => context.newPage());
    return new PlaywrightDriver(context, page);
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const browser = await this.browser;
    this.browser = null;
    await browser.close();
    this.logger.info({ type: this.options.type }, "Browser closed");
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      const { type, show, slowdown } = this.options;
      this.logger.info({ type, mode: this.mode }, "Launching browser");
      this.browser = guard(`launch ${type}`, () =>
        LAUNCHERS[type].launch({ headless: !show, slowMo: slowdown }),
      ).catch((err: unknown) => {
        this.browser = null;
        throw err;
      });
    }
    return this.browser;
  }
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof DriverError || err instanceof TimeoutError) throw err;
    if (err instanceof errors.TimeoutError) {
      throw new TimeoutError(`${operation} timed out`, undefined, { cause: err });
    }
    throw new DriverError(`${operation} failed: ${toError(err).message}`, { cause: err });
  }
}
