// ============================================================================
// DSL Types: declarative crawl definition (validated form)
// ============================================================================

import type { ActionType, KeyboardModifier, MouseButton, ReadyState } from "../driver/types.js";
import type { ComparisonOperator, Value } from "../notation/values.js";
import type { KeyCreatePolicy, WriteMode } from "../scope/keypath.js";

export interface CrawlConfig {
  /** Number of pages crawled concurrently */
  race: number;
  /** Global variables, readable from every task */
  vars: Record<string, Value>;
  browser: BrowserOptions;
  keyMatch: { create: KeyCreatePolicy };
  output: OutputOptions;
  pages: PageConfig[];
}

export type BrowserType = "chromium" | "firefox" | "webkit";

export interface BrowserOptions {
  type: BrowserType;
  show: boolean;
  slowdown?: number;
  viewport?: [number, number];
  /** Default timeout for navigation and every page wait (ms) */
  timeout: number;
  readyOn: ReadyState;
  /** Upper bound for a conditional repeat loop (ms) */
  repeatTimeout: number;
}

export type OutputFormat = "json";

export interface OutputOptions {
  path: string;
  name: string;
  formats: OutputFormat[];
}

// ---------------------------------------------------------------------------
// Pages
// ---------------------------------------------------------------------------

export type LinkRef =
  | { kind: "url"; url: string; metadata: Record<string, Value> }
  | { kind: "group"; name: string };

export interface PageConfig {
  link: LinkRef[];
  /** Task-level variables; captures to these names are promoted to the task */
  vars: Record<string, Value>;
  interact?: InteractConfig;
}

// ---------------------------------------------------------------------------
// Interactions
// ---------------------------------------------------------------------------

export interface RepeatCondition {
  /** Template evaluated against the live page */
  value: string;
  operator: ComparisonOperator;
  operand: string;
  /** Used when the value's element is missing */
  default?: string;
}

export type RepeatSpec =
  | { kind: "count"; count: number }
  | { kind: "while"; conditions: RepeatCondition[] };

export interface InteractConfig {
  repeat?: RepeatSpec;
  /** Each entry lists alternatives; the first one with matches runs */
  nodes: NodeConfig[][];
}

export interface RangeSpec {
  start?: number;
  stop?: number;
  step: number;
}

export interface NodeConfig {
  name?: string;
  selector: string;
  all: boolean;
  show: boolean;
  /** Zero matches abort the task instead of skipping the node */
  required: boolean;
  wait?: number;
  contains?: string;
  excludes?: string;
  range?: RangeSpec;
  actions: ActionSpec[];
  links: LinkSpec[];
  data: DataSpec[];
  interact?: InteractConfig;
}

export interface ActionSpec {
  type: ActionType;
  delay?: number;
  wait?: number;
  /** Repetitions; a template is evaluated against the element */
  count: number | string;
  /** Screenshot path template, evaluated before the action runs */
  screenshot?: string;
  dispatch: boolean;
  value?: string;
  key?: string;
  button?: MouseButton;
  modifiers?: KeyboardModifier[];
}

export interface LinkSpec {
  name: string;
  url: string;
  metadata: Record<string, string>;
}

export type ValueSpec =
  | { kind: "scalar"; template: string }
  | { kind: "list"; items: ValueSpec[] }
  | { kind: "object"; fields: Record<string, ValueSpec> };

export interface DataSpec {
  scope: string;
  value: ValueSpec;
  /** Defaults to "append" for `all` nodes, "merge" otherwise */
  mode?: WriteMode;
}
