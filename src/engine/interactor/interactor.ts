import { context, type Context } from "@opentelemetry/api";
import { setTimeout as sleep } from "node:timers/promises";
import pino from "pino";
import type { DriverAction, PageDriver, QueryFilter } from "../../driver/types.js";
import type {
  ActionSpec,
  DataSpec,
  InteractConfig,
  LinkSpec,
  NodeConfig,
  RangeSpec,
  RepeatCondition,
  ValueSpec,
} from "../../dsl/types.js";
import {
  ElementNotFoundError,
  NotationEvaluationError,
  TimeoutError,
  toError,
} from "../../errors.js";
import type { LinkQueue } from "../../links/link-queue.js";
import {
  evaluateTemplate,
  toText,
  type EvaluateOptions,
  type PageContext,
} from "../../notation/evaluator.js";
import type { UtilityRegistry } from "../../notation/utilities.js";
import { compareScalars, parseNumeric, type Value } from "../../notation/values.js";
import {
  assignScope,
  keypathToString,
  resolveScope,
  type KeyCreatePolicy,
  type TreeMap,
  type TreeValue,
} from "../../scope/keypath.js";
import type { VariableScope } from "../../scope/variables.js";
import { noopMetrics, type TrawlMetrics } from "../../observability/metrics.js";
import { endSpanError, endSpanOk, startNodeSpan } from "../../observability/tracer.js";

export interface InteractorOptions {
  /** Shared result tree */
  tree: TreeMap;
  links: LinkQueue;
  /** Default wait (ms) for a node whose `wait` is 0 */
  timeout: number;
  /** Upper bound (ms) for one conditional repeat loop */
  repeatTimeout: number;
  keyMatch?: KeyCreatePolicy;
  utilities?: UtilityRegistry;
  logger?: pino.Logger;
  metrics?: TrawlMetrics;
  /** Parent span context, normally the task span */
  traceContext?: Context;
}

export interface Match<H> {
  element: H;
  /** Position within the selected range */
  nth: number;
}

/**
 * Walks an interaction tree over one page: select, act, extract, recurse,
 * repeat. Errors abort the walk and propagate to the caller.
 */
export class Interactor<H> {
  private logger: pino.Logger;
  private metrics: TrawlMetrics;
  private evaluateOptions: EvaluateOptions;

  constructor(
    private readonly driver: PageDriver<H>,
    private readonly options: InteractorOptions,
  ) {
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "trawl.interactor",
    });
    this.metrics = options.metrics ?? noopMetrics();
    this.evaluateOptions = options.utilities ? { utilities: options.utilities } : {};
  }

  async run(interact: InteractConfig, vars: VariableScope): Promise<void> {
    await this.interact(interact, null, vars, this.options.traceContext ?? context.active());
  }

  // ---------------------------------------------------------------------------
  // Repeat
  // ---------------------------------------------------------------------------

  private async interact(
    config: InteractConfig,
    parent: H | null,
    vars: VariableScope,
    ctx: Context,
  ): Promise<void> {
    const repeat = config.repeat;

    if (!repeat) {
      await this.pass(config.nodes, parent, vars, ctx);
      return;
    }

    if (repeat.kind === "count") {
      for (let i = 0; i < repeat.count; i++) {
        await this.pass(config.nodes, parent, vars, ctx);
      }
      return;
    }

    const limit = this.options.repeatTimeout;
    const deadline = Date.now() + limit;
    let passes = 0;
    for (;;) {
      await this.pass(config.nodes, parent, vars, ctx);
      passes++;
      if (!(await this.shouldRepeat(repeat.conditions, vars))) break;
      if (Date.now() >= deadline) {
        throw new TimeoutError(`Repeat loop still running after ${passes} passes (${limit}ms)`, limit);
      }
    }
    this.logger.debug({ passes }, "Repeat loop finished");
  }

  /** Every condition must hold for another pass. */
  private async shouldRepeat(
    conditions: RepeatCondition[],
    vars: VariableScope,
  ): Promise<boolean> {
    // Conditions read the live page, not the element the loop runs under
    const page: PageContext<H> = { driver: this.driver, element: null };

    for (const condition of conditions) {
      let value: Value;
      try {
        value = await evaluateTemplate(condition.value, page, vars, this.evaluateOptions);
      } catch (err) {
        if (!(err instanceof ElementNotFoundError) || condition.default === undefined) throw err;
        value = condition.default;
      }

      if (Array.isArray(value)) {
        throw new NotationEvaluationError(`Repeat condition "${condition.value}" produced a list`);
      }
      if (!compareScalars(value, condition.operator, condition.operand)) return false;
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  private async pass(
    nodes: NodeConfig[][],
    parent: H | null,
    vars: VariableScope,
    ctx: Context,
  ): Promise<void> {
    for (const alternatives of nodes) {
      for (const node of alternatives) {
        const found = await this.select(node, parent);
        if (found.length === 0) {
          if (node.required) throw new ElementNotFoundError(node.selector);
          continue;
        }
        await this.runNode(node, pickMatches(found, node.range, node.all), vars, ctx);
        break;
      }
    }
  }

  private async select(node: NodeConfig, parent: H | null): Promise<H[]> {
    if (node.wait !== undefined) {
      const ms = node.wait || this.options.timeout;
      const ready = await this.driver.waitFor({ selector: node.selector, scope: parent }, ms);
      if (!ready) {
        throw new TimeoutError(`Timed out after ${ms}ms waiting for "${node.selector}"`, ms);
      }
    }

    const filter: QueryFilter = {};
    if (node.contains !== undefined) filter.hasText = node.contains;
    if (node.excludes !== undefined) filter.hasNotText = node.excludes;
    return this.driver.query(node.selector, parent, filter);
  }

  private async runNode(
    node: NodeConfig,
    matches: Match<H>[],
    vars: VariableScope,
    ctx: Context,
  ): Promise<void> {
    const name = nodeName(node);
    this.logger.debug({ node: name, selector: node.selector, matches: matches.length }, "Interacting with node");

    for (const { element, nth } of matches) {
      const started = Date.now();
      const { span, ctx: nodeCtx } = startNodeSpan(ctx, name, nth);
      const scope = vars.child({ _node: name, _nth: nth });
      const page: PageContext<H> = { driver: this.driver, element };

      try {
        if (node.show) await this.driver.scrollIntoView(element);
        for (const action of node.actions) await this.act(action, element, page, scope);
        for (const link of node.links) await this.captureLink(link, page, scope);
        for (const data of node.data) await this.extract(data, page, scope, node.all);
        if (node.interact) await this.interact(node.interact, element, scope, nodeCtx);
        endSpanOk(span);
      } catch (err) {
        endSpanError(span, toError(err));
        throw err;
      } finally {
        this.metrics.nodeDuration(Date.now() - started, { node: name });
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Actions, links, data
  // ---------------------------------------------------------------------------

  private async act(
    action: ActionSpec,
    element: H,
    page: PageContext<H>,
    vars: VariableScope,
  ): Promise<void> {
    // The action may remove the element, so anything read from it comes first
    const screenshot =
      action.screenshot !== undefined
        ? await this.text(action.screenshot, page, vars)
        : undefined;
    const count =
      typeof action.count === "number"
        ? action.count
        : toCount(await evaluateTemplate(action.count, page, vars, this.evaluateOptions), action.count);

    const driverAction: DriverAction = { type: action.type, dispatch: action.dispatch };
    if (action.value !== undefined) driverAction.value = await this.text(action.value, page, vars);
    if (action.key !== undefined) driverAction.key = action.key;
    if (action.button !== undefined) driverAction.button = action.button;
    if (action.modifiers !== undefined) driverAction.modifiers = action.modifiers;

    for (let i = 0; i < count; i++) {
      if (action.delay) await sleep(action.delay);
      await this.driver.performAction(element, driverAction);
      if (action.wait) await sleep(action.wait);
    }

    if (screenshot) {
      await this.driver.screenshot(screenshot);
      this.logger.debug({ path: screenshot }, "Screenshot saved");
    }
  }

  /** A url that evaluates to a list captures one link per item, all sharing the metadata. */
  private async captureLink(link: LinkSpec, page: PageContext<H>, vars: VariableScope): Promise<void> {
    const value = await evaluateTemplate(link.url, page, vars, this.evaluateOptions);
    const urls = (Array.isArray(value) ? value : [value]).map((item) => toText(item, link.url));
    const metadata: Record<string, Value> = {};
    for (const [key, template] of Object.entries(link.metadata)) {
      metadata[key] = await evaluateTemplate(template, page, vars, this.evaluateOptions);
    }

    const url = vars.get("_url");
    const base = typeof url === "string" ? url : this.driver.url();
    for (const item of urls) {
      if (this.options.links.capture(link.name, item, metadata, base)) {
        this.metrics.linksCaptured({ group: link.name });
      }
    }
  }

  private async extract(
    data: DataSpec,
    page: PageContext<H>,
    vars: VariableScope,
    all: boolean,
  ): Promise<void> {
    const value = await this.resolveValue(data.value, page, vars);

    // No await between resolving and writing: the write is atomic
    const cursor = resolveScope(data.scope, this.options.tree, vars, {
      ...this.evaluateOptions,
      create: this.options.keyMatch ?? "equality",
    });
    assignScope(value, cursor, data.mode ?? (all ? "append" : "merge"));

    this.logger.debug({ keypath: keypathToString(cursor) }, "Data written");
  }

  private async resolveValue(
    spec: ValueSpec,
    page: PageContext<H>,
    vars: VariableScope,
  ): Promise<TreeValue> {
    switch (spec.kind) {
      case "scalar":
        return evaluateTemplate(spec.template, page, vars, this.evaluateOptions);
      case "list": {
        const items: TreeValue[] = [];
        for (const item of spec.items) items.push(await this.resolveValue(item, page, vars));
        return items;
      }
      case "object": {
        const fields: TreeMap = {};
        for (const [key, field] of Object.entries(spec.fields)) {
          fields[key] = await this.resolveValue(field, page, vars);
        }
        return fields;
      }
    }
  }

  private async text(template: string, page: PageContext<H>, vars: VariableScope): Promise<string> {
    return toText(await evaluateTemplate(template, page, vars, this.evaluateOptions), template);
  }
}

/** Node name for logs and the `_node` variable. */
export function nodeName(node: NodeConfig): string {
  return (node.name ?? node.selector).replace(/:/g, "-");
}

/**
 * Apply `range` to the matches, then keep the first one unless the node
 * takes them all. Negative bounds count from the end.
 */
export function pickMatches<H>(found: H[], range: RangeSpec | undefined, all: boolean): Match<H>[] {
  const selected = found.slice(range?.start ?? 0, range?.stop ?? found.length);
  if (!all) return selected.slice(0, 1).map((element) => ({ element, nth: 0 }));

  const step = range?.step ?? 1;
  const matches: Match<H>[] = [];
  for (let i = 0; i < selected.length; i += step) {
    matches.push({ element: selected[i], nth: i });
  }
  return matches;
}

function toCount(value: Value, source: string): number {
  const n = Array.isArray(value) ? null : parseNumeric(value);
  if (n === null || n < 0) {
    throw new NotationEvaluationError(`Action count "${source}" is not a non-negative number`);
  }
  return Math.floor(n);
}
