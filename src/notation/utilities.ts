import { NotationEvaluationError, UnknownUtilityError } from "../errors.js";
import type { UtilityCall } from "./ast.js";
import { parseNumeric, scalarToString, type Scalar, type Value } from "./values.js";

export interface UtilityContext {
  /** Base URL for `absolute_url`, normally the task's `_url` */
  baseUrl?: string;
}

export type UtilityFn = (value: Value, arg: string | undefined, ctx: UtilityContext) => Value;

/** Lift a scalar transform so it maps over lists. */
function scalar(fn: (value: Scalar, arg: string | undefined, ctx: UtilityContext) => Scalar): UtilityFn {
  const apply: UtilityFn = (value, arg, ctx) =>
    Array.isArray(value) ? value.map((v) => apply(v, arg, ctx)) : fn(value, arg, ctx);
  return apply;
}

/** Like `scalar`, but null passes through untouched. */
function text(fn: (value: string, arg: string | undefined, ctx: UtilityContext) => Scalar): UtilityFn {
  return scalar((value, arg, ctx) => (value === null ? null : fn(String(value), arg, ctx)));
}

function requireArg(name: string, arg: string | undefined): string {
  if (arg === undefined) {
    throw new NotationEvaluationError(`Utility "${name}" requires an argument`);
  }
  return arg;
}

function numericArg(name: string, arg: string | undefined): number {
  const n = parseNumeric(requireArg(name, arg));
  if (n === null) {
    throw new NotationEvaluationError(`Utility "${name}" expects a numeric argument, got "${arg}"`);
  }
  return n;
}

/** Pull the first number out of text such as "£1,299.50" or "12 reviews". */
export function extractNumber(value: Scalar): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "boolean" || value === null) return null;
  const m = /-?\d+(?:\.\d+)?/.exec(value.replace(/(\d),(?=\d{3}\b)/g, "$1"));
  return m ? Number(m[0]) : null;
}

function arithmetic(name: string, op: (a: number, b: number) => number): UtilityFn {
  return scalar((value, arg) => op(extractNumber(value) ?? 0, numericArg(name, arg)));
}

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

const BUILTIN_UTILITIES: Record<string, UtilityFn> = {
  trim: text((v) => v.trim()),
  lowercase: text((v) => v.toLowerCase()),
  uppercase: text((v) => v.toUpperCase()),
  slug: text((v) => slugify(v)),
  number: scalar((v) => extractNumber(v)),
  int: scalar((v) => {
    const n = extractNumber(v);
    return n === null ? null : Math.trunc(n);
  }),
  add: arithmetic("add", (a, b) => a + b),
  subtract: arithmetic("subtract", (a, b) => a - b),
  multiply: arithmetic("multiply", (a, b) => a * b),
  divide: arithmetic("divide", (a, b) => {
    if (b === 0) throw new NotationEvaluationError('Utility "divide" cannot divide by zero');
    return a / b;
  }),
  prepend: scalar((v, arg) => `${requireArg("prepend", arg)}${scalarToString(v)}`),
  append: scalar((v, arg) => `${scalarToString(v)}${requireArg("append", arg)}`),
  replace: text((v, arg) => {
    const spec = requireArg("replace", arg);
    const sep = spec.indexOf("=>");
    if (sep < 0) {
      throw new NotationEvaluationError(`Utility "replace" expects "search=>replacement", got "${spec}"`);
    }
    return v.split(spec.slice(0, sep)).join(spec.slice(sep + 2));
  }),
  clear_url_params: text((v) => v.split("?")[0]),
  absolute_url: text((v, _arg, ctx) => {
    try {
      return ctx.baseUrl ? new URL(v, ctx.baseUrl).href : new URL(v).href;
    } catch {
      return v;
    }
  }),
  default: (value, arg) => (value === null || value === "" ? (arg ?? "") : value),
  join: (value, arg) =>
    Array.isArray(value)
      ? value.map((v) => (Array.isArray(v) ? v.join(arg ?? ",") : scalarToString(v))).join(arg ?? ",")
      : value,
  split: (value, arg) => {
    if (value === null || Array.isArray(value)) return value;
    return scalarToString(value)
      .split(arg ?? ",")
      .map((part) => part.trim());
  },
  first: (value) => (Array.isArray(value) ? (value[0] ?? null) : value),
  last: (value) => (Array.isArray(value) ? (value[value.length - 1] ?? null) : value),
};

/**
 * Named value transforms available to `|name arg` pipelines.
 */
export class UtilityRegistry {
  private utilities = new Map<string, UtilityFn>(Object.entries(BUILTIN_UTILITIES));

  register(name: string, fn: UtilityFn): void {
    this.utilities.set(name, fn);
  }

  has(name: string): boolean {
    return this.utilities.has(name);
  }

  get names(): string[] {
    return Array.from(this.utilities.keys());
  }

  /** Apply a pipeline left to right. */
  apply(pipeline: UtilityCall[], value: Value, ctx: UtilityContext): Value {
    let current = value;
    for (const call of pipeline) {
      const fn = this.utilities.get(call.name);
      if (!fn) throw new UnknownUtilityError(call.name);
      current = fn(current, call.arg, ctx);
    }
    return current;
  }
}

export const defaultUtilities = new UtilityRegistry();
