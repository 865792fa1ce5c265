import { ElementNotFoundError, NotationEvaluationError } from "../errors.js";
import type { PageDriver } from "../driver/types.js";
import type { VariableScope } from "../scope/variables.js";
import { singleExpression, type AttrExpr, type Expr, type Template, type VarExpr } from "./ast.js";
import { parseTemplate } from "./parser.js";
import { defaultUtilities, type UtilityContext, type UtilityRegistry } from "./utilities.js";
import { scalarToString, type Value } from "./values.js";

/** Where `$attr{}` reads happen: the page, and the element `<parent>` refers to. */
export interface PageContext<H> {
  driver: PageDriver<H>;
  /** null = the page itself */
  element: H | null;
}

export interface EvaluateOptions {
  utilities?: UtilityRegistry;
}

/**
 * Evaluate a template. A template that is exactly one expression yields the
 * expression's raw value (possibly a list); mixed text is interpolated into
 * a string.
 */
export async function evaluateTemplate<H>(
  source: string | Template,
  page: PageContext<H> | null,
  vars: VariableScope,
  options: EvaluateOptions = {},
): Promise<Value> {
  const template = typeof source === "string" ? parseTemplate(source) : source;
  const only = singleExpression(template);
  if (only) return evaluateExpression(only, page, vars, options);

  let out = "";
  for (const part of template.parts) {
    if (part.kind === "text") {
      out += part.value;
      continue;
    }
    out += interpolate(await evaluateExpression(part, page, vars, options), part, template);
  }
  return out;
}

export async function evaluateExpression<H>(
  expr: Expr,
  page: PageContext<H> | null,
  vars: VariableScope,
  options: EvaluateOptions = {},
): Promise<Value> {
  if (expr.kind === "var") return evaluateVar(expr, vars, options);

  if (!page) {
    throw new NotationEvaluationError(`${expr.source} reads the page, which is not available here`);
  }
  return evaluateAttr(expr, page, vars, options);
}

/**
 * Synchronous evaluation for templates that may only read variables,
 * such as scope path segments.
 */
export function interpolateVars(
  source: string | Template,
  vars: VariableScope,
  options: EvaluateOptions = {},
): Value {
  const template = typeof source === "string" ? parseTemplate(source) : source;
  const only = singleExpression(template);
  if (only) return evaluateVarOnly(only, vars, options);

  let out = "";
  for (const part of template.parts) {
    out += part.kind === "text"
      ? part.value
      : interpolate(evaluateVarOnly(part, vars, options), part, template);
  }
  return out;
}

/** Coerce a value to a single string, refusing lists. */
export function toText(value: Value, source: string): string {
  if (Array.isArray(value)) {
    throw new NotationEvaluationError(`"${source}" produced a list where a single value was expected`);
  }
  return scalarToString(value);
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function interpolate(value: Value, expr: Expr, template: Template): string {
  if (Array.isArray(value)) {
    throw new NotationEvaluationError(
      `${expr.source} produced a list and cannot be interpolated into "${template.source}"`,
    );
  }
  return scalarToString(value);
}

function evaluateVarOnly(expr: Expr, vars: VariableScope, options: EvaluateOptions): Value {
  if (expr.kind === "attr") {
    throw new NotationEvaluationError(`${expr.source} reads the page, which is not available here`);
  }
  return evaluateVar(expr, vars, options);
}

function utilityContext(vars: VariableScope): UtilityContext {
  const base = vars.get("_url");
  return typeof base === "string" ? { baseUrl: base } : {};
}

function evaluateVar(expr: VarExpr, vars: VariableScope, options: EvaluateOptions): Value {
  const utilities = options.utilities ?? defaultUtilities;
  return utilities.apply(expr.pipeline, vars.lookup(expr.name), utilityContext(vars));
}

async function evaluateAttr<H>(
  expr: AttrExpr,
  page: PageContext<H>,
  vars: VariableScope,
  options: EvaluateOptions,
): Promise<Value> {
  const { driver } = page;
  const utilities = options.utilities ?? defaultUtilities;
  const root = expr.context === "page" ? null : page.element;

  let targets: H[];
  if (expr.selector !== undefined) {
    targets = await driver.query(expr.selector, root);
  } else if (root !== null) {
    targets = [root];
  } else {
    targets = await driver.query(":root", null);
  }

  let value: Value;
  if (expr.attribute === "count") {
    value = targets.length;
  } else if (expr.match === "all") {
    const items: Value[] = [];
    for (const target of targets) {
      items.push(await readAttribute(driver, target, expr));
    }
    value = items;
  } else if (targets.length === 0) {
    // `|default` marks the read as optional
    if (!expr.pipeline.some((u) => u.name === "default")) {
      throw new ElementNotFoundError(expr.selector ?? ":root");
    }
    value = null;
  } else {
    value = await readAttribute(driver, targets[0], expr);
  }

  value = utilities.apply(expr.pipeline, value, utilityContext(vars));
  if (expr.capture !== undefined) vars.set(expr.capture, value);
  return value;
}

async function readAttribute<H>(
  driver: PageDriver<H>,
  target: H,
  expr: AttrExpr,
): Promise<Value> {
  const node = expr.child !== undefined ? await driver.getChild(target, expr.child) : target;
  if (node === null) return null;

  switch (expr.attribute) {
    case "text":
      return driver.getText(node);
    case "disabled":
      return driver.isDisabled(node);
    default:
      return driver.getAttribute(node, expr.attribute);
  }
}
