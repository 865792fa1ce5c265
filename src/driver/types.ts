// ============================================================================
// Page Driver: the page-automation capability the crawler consumes
// ============================================================================

export const ACTION_TYPES = [
  "click",
  "dblclick",
  "hover",
  "focus",
  "type",
  "press",
  "check",
  "uncheck",
  "swipe_left",
  "swipe_right",
  "scroll",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export type ReadyState = "load" | "domcontentloaded" | "networkidle" | "commit";

export type MouseButton = "left" | "right" | "middle";

export type KeyboardModifier = "Alt" | "Control" | "Meta" | "Shift";

/** An action with every template already evaluated. */
export interface DriverAction {
  type: ActionType;
  /** Fire a synthetic DOM event named after the type instead of a real input */
  dispatch: boolean;
  /** Text for `type` */
  value?: string;
  /** Key for `press` */
  key?: string;
  button?: MouseButton;
  modifiers?: KeyboardModifier[];
}

export interface QueryFilter {
  /** Keep only matches whose text contains this string */
  hasText?: string;
  /** Drop matches whose text contains this string */
  hasNotText?: string;
}

export interface WaitCondition<H> {
  selector: string;
  /** null = whole page */
  scope: H | null;
}

/**
 * One isolated browsing context with one page. `H` is the driver's node
 * handle type; handles never cross drivers.
 */
export interface PageDriver<H> {
  /** Resolve a selector within `scope` (null = page), in document order. */
  query(selector: string, scope: H | null, filter?: QueryFilter): Promise<H[]>;
  getAttribute(handle: H, name: string): Promise<string | null>;
  getText(handle: H): Promise<string | null>;
  isDisabled(handle: H): Promise<boolean>;
  /** 1-indexed child node (text nodes included). */
  getChild(handle: H, n: number): Promise<H | null>;
  performAction(handle: H, action: DriverAction): Promise<void>;
  scrollIntoView(handle: H): Promise<void>;
  screenshot(path: string): Promise<void>;
  /** Resolves false when the condition did not hold within the timeout. */
  waitFor(condition: WaitCondition<H>, timeoutMs: number): Promise<boolean>;
  navigate(url: string, readyOn: ReadyState, timeoutMs: number): Promise<void>;
  url(): string;
  close(): Promise<void>;
}

/** Hands out one fresh, unshared page context per task. */
export interface DriverFactory<H> {
  /** "headless", "visible", "static", ... (reported in the crawl summary) */
  readonly mode: string;
  /** Acquire shared resources up front (launch the browser). */
  start(): Promise<void>;
  open(): Promise<PageDriver<H>>;
  close(): Promise<void>;
}
