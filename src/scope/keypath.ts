import {
  KeyMatchNotFoundError,
  NotationSyntaxError,
  ScopeResolutionError,
} from "../errors.js";
import type { Template } from "../notation/ast.js";
import { interpolateVars, type EvaluateOptions } from "../notation/evaluator.js";
import { findClosingBrace, parseTemplate } from "../notation/parser.js";
import {
  compareScalars,
  scalarToString,
  type ComparisonOperator,
  type Scalar,
} from "../notation/values.js";
import type { VariableScope } from "./variables.js";

// ============================================================================
// Result tree + scope paths
// ============================================================================
//
//   data.products.$key{sku=$var{sku}}.reviews
//   ^^^^ ^^^^^^^^ ^^^^^^^^^^^^^^^^^^^^ ^^^^^^^
//   field  field   predicate over a     terminal
//                  sequence
//

export type TreeValue = Scalar | TreeValue[] | TreeMap;

export interface TreeMap {
  [key: string]: TreeValue;
}

/**
 * When a `$key{}` predicate finds no entry:
 *   - "equality": create an entry, but only for "="
 *   - "always":   create for every operator
 *   - "never":    raise KeyMatchNotFoundError
 */
export type KeyCreatePolicy = "equality" | "always" | "never";

export type WriteMode = "merge" | "append";

export type ScopeSegment =
  | { kind: "field"; source: string; name: Template }
  | {
      kind: "key";
      source: string;
      left: Template;
      op: ComparisonOperator;
      right: Template;
    };

type Trail = Array<string | number>;

/** A resolved write position: a container plus the slot inside it. */
export type ScopeCursor =
  | { kind: "map"; container: TreeMap; key: string; trail: Trail }
  | { kind: "list"; container: TreeValue[]; index: number; trail: Trail };

export interface ResolveOptions extends EvaluateOptions {
  create?: KeyCreatePolicy;
}

const KEY_OPEN = "$key{";
const TWO_CHAR_OPERATORS: ComparisonOperator[] = ["!=", ">=", "<="];
const ONE_CHAR_OPERATORS: ComparisonOperator[] = ["=", ">", "<"];

const pathCache = new Map<string, ScopeSegment[]>();

export function isTreeMap(value: TreeValue | undefined): value is TreeMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseScopePath(path: string): ScopeSegment[] {
  const cached = pathCache.get(path);
  if (cached) return cached;

  const segments: ScopeSegment[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i <= path.length; i++) {
    const ch = path[i];
    if (ch === "{") depth++;
    else if (ch === "}") depth--;

    if (i === path.length || (ch === "." && depth === 0)) {
      const raw = path.slice(start, i).trim();
      if (raw === "") throw new NotationSyntaxError(path, start, "Empty scope segment");
      segments.push(parseSegment(raw, path, start));
      start = i + 1;
    }
  }

  pathCache.set(path, segments);
  return segments;
}

function parseSegment(raw: string, path: string, offset: number): ScopeSegment {
  if (!raw.startsWith(KEY_OPEN)) {
    return { kind: "field", source: raw, name: parseTemplate(raw) };
  }

  const close = findClosingBrace(raw, KEY_OPEN.length);
  if (close !== raw.length - 1) {
    throw new NotationSyntaxError(path, offset, `Malformed predicate segment "${raw}"`);
  }

  const body = raw.slice(KEY_OPEN.length, close);
  const found = findOperator(body);
  if (!found) {
    throw new NotationSyntaxError(
      path,
      offset,
      `Predicate "${raw}" needs one of =, !=, >=, <=, >, <`,
    );
  }

  const left = body.slice(0, found.index).trim();
  const right = body.slice(found.index + found.op.length).trim();
  if (left === "") {
    throw new NotationSyntaxError(path, offset, `Predicate "${raw}" has no field name`);
  }

  return {
    kind: "key",
    source: raw,
    left: parseTemplate(left),
    op: found.op,
    right: parseTemplate(right),
  };
}

function findOperator(body: string): { index: number; op: ComparisonOperator } | null {
  let depth = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === "{") depth++;
    else if (ch === "}") depth--;
    if (depth !== 0) continue;

    const two = TWO_CHAR_OPERATORS.find((op) => body.startsWith(op, i));
    if (two) return { index: i, op: two };
    const one = ONE_CHAR_OPERATORS.find((op) => body.startsWith(op, i));
    if (one) return { index: i, op: one };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Walk a scope path through the tree, creating intermediate containers,
 * and return the write position of its last segment.
 */
export function resolveScope(
  path: string,
  root: TreeMap,
  vars: VariableScope,
  options: ResolveOptions = {},
): ScopeCursor {
  const [head, ...rest] = parseScopePath(path);

  if (head.kind === "key") {
    throw new ScopeResolutionError(path, "the result root is a mapping, start with a field name");
  }

  const key = fieldName(head, vars, path, options);
  let cursor: ScopeCursor = { kind: "map", container: root, key, trail: [key] };

  for (const segment of rest) {
    cursor =
      segment.kind === "field"
        ? descendField(cursor, fieldName(segment, vars, path, options), path)
        : descendKey(cursor, segment, vars, path, options);
  }

  return cursor;
}

export function readCursor(cursor: ScopeCursor): TreeValue | undefined {
  return cursor.kind === "map"
    ? cursor.container[cursor.key]
    : cursor.container[cursor.index];
}

function writeCursor(cursor: ScopeCursor, value: TreeValue): void {
  if (cursor.kind === "map") cursor.container[cursor.key] = value;
  else cursor.container[cursor.index] = value;
}

function fieldName(
  segment: Extract<ScopeSegment, { kind: "field" }>,
  vars: VariableScope,
  path: string,
  options: EvaluateOptions,
): string {
  const value = interpolateVars(segment.name, vars, options);
  if (Array.isArray(value)) {
    throw new ScopeResolutionError(path, `segment "${segment.source}" produced a list`);
  }
  const name = scalarToString(value);
  if (name === "") {
    throw new ScopeResolutionError(path, `segment "${segment.source}" is empty`);
  }
  return safeKey(name, path);
}

const RESERVED_KEYS = new Set(["__proto__", "constructor", "prototype"]);

/** Keys that would reach an object's prototype are never written. */
function safeKey(key: string, path: string): string {
  if (RESERVED_KEYS.has(key)) {
    throw new ScopeResolutionError(path, `"${key}" cannot be used as a field name`);
  }
  return key;
}

function descendField(cursor: ScopeCursor, name: string, path: string): ScopeCursor {
  const current = readCursor(cursor);

  if (Array.isArray(current) && /^\d+$/.test(name)) {
    const index = Number(name);
    if (index > current.length) {
      throw new ScopeResolutionError(
        path,
        `index ${index} is past the end of "${keypathToString(cursor)}" (${current.length} entries)`,
      );
    }
    return { kind: "list", container: current, index, trail: [...cursor.trail, index] };
  }

  let next: TreeMap;
  if (current === undefined || current === null) {
    next = {};
    writeCursor(cursor, next);
  } else if (isTreeMap(current)) {
    next = current;
  } else {
    throw new ScopeResolutionError(
      path,
      `"${keypathToString(cursor)}" holds ${describe(current)}, not a mapping`,
    );
  }

  return { kind: "map", container: next, key: name, trail: [...cursor.trail, name] };
}

function descendKey(
  cursor: ScopeCursor,
  segment: Extract<ScopeSegment, { kind: "key" }>,
  vars: VariableScope,
  path: string,
  options: ResolveOptions,
): ScopeCursor {
  const current = readCursor(cursor);

  let list: TreeValue[];
  if (current === undefined || current === null) {
    list = [];
    writeCursor(cursor, list);
  } else if (Array.isArray(current)) {
    list = current;
  } else {
    throw new ScopeResolutionError(
      path,
      `${segment.source} needs a sequence but "${keypathToString(cursor)}" holds ${describe(current)}`,
    );
  }

  const field = safeKey(
    scalarToString(scalarOf(interpolateVars(segment.left, vars, options), segment, path)),
    path,
  );
  const operand = scalarOf(interpolateVars(segment.right, vars, options), segment, path);

  const index = list.findIndex((entry) => {
    if (!isTreeMap(entry)) return false;
    const candidate = entry[field];
    if (candidate === undefined || (typeof candidate === "object" && candidate !== null)) {
      return false;
    }
    return compareScalars(candidate, segment.op, operand);
  });

  if (index >= 0) {
    return { kind: "list", container: list, index, trail: [...cursor.trail, index] };
  }

  if (!mayCreate(options.create ?? "equality", segment.op)) {
    throw new KeyMatchNotFoundError(segment.source);
  }

  list.push({ [field]: operand });
  const created = list.length - 1;
  return { kind: "list", container: list, index: created, trail: [...cursor.trail, created] };
}

function scalarOf(
  value: ReturnType<typeof interpolateVars>,
  segment: ScopeSegment,
  path: string,
): Scalar {
  if (Array.isArray(value)) {
    throw new ScopeResolutionError(path, `${segment.source} compares against a list`);
  }
  return value;
}

function mayCreate(policy: KeyCreatePolicy, op: ComparisonOperator): boolean {
  switch (policy) {
    case "always":
      return true;
    case "never":
      return false;
    case "equality":
      return op === "=";
  }
}

function describe(value: TreeValue): string {
  if (Array.isArray(value)) return "a sequence";
  if (isTreeMap(value)) return "a mapping";
  return `the ${typeof value} ${JSON.stringify(value)}`;
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Write a value at a resolved position.
 *
 * merge:  mappings merge key by key into an existing mapping; anything else
 *         replaces the slot.
 * append: the slot holds a sequence (created when empty) and the value is
 *         pushed onto it.
 */
export function assignScope(value: TreeValue, cursor: ScopeCursor, mode: WriteMode = "merge"): void {
  const existing = readCursor(cursor);

  if (mode === "append") {
    if (existing === undefined || existing === null) {
      writeCursor(cursor, [value]);
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      throw new ScopeResolutionError(
        keypathToString(cursor),
        `cannot append to ${describe(existing)}`,
      );
    }
    return;
  }

  if (isTreeMap(value) && isTreeMap(existing)) {
    const path = keypathToString(cursor);
    for (const [k, v] of Object.entries(value)) existing[safeKey(k, path)] = v;
    return;
  }

  writeCursor(cursor, value);
}

/** Render a cursor's trail, e.g. `data.products[2].name`. */
export function keypathToString(cursor: ScopeCursor): string {
  return cursor.trail
    .map((part, i) => (typeof part === "number" ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join("");
}
