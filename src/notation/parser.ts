import { NotationSyntaxError } from "../errors.js";
import {
  singleExpression,
  type AttrExpr,
  type ContextKind,
  type Expr,
  type MatchMode,
  type Template,
  type TemplatePart,
  type UtilityCall,
  type VarExpr,
} from "./ast.js";

const ATTR_OPEN = "$attr{";
const VAR_OPEN = "$var{";

const IDENTIFIER = /^[A-Za-z_]\w*$/;

const templateCache = new Map<string, Template>();

/**
 * Parse a string that may mix literal text with `$attr{}` / `$var{}`
 * expressions, either bare or wrapped in `{...}`. Results are cached by
 * source string; parsing either succeeds completely or throws
 * NotationSyntaxError.
 */
export function parseTemplate(source: string): Template {
  const cached = templateCache.get(source);
  if (cached) return cached;

  const template: Template = {
    source,
    parts: new TemplateParser(source).parse(),
  };
  templateCache.set(source, template);
  return template;
}

/** Parse a source that must consist of exactly one expression. */
export function parseExpression(source: string): Expr {
  const expr = singleExpression(parseTemplate(source));
  if (!expr) {
    throw new NotationSyntaxError(source, 0, "Expected a single $attr{} or $var{} expression");
  }
  return expr;
}

/**
 * Index of the "}" closing a brace opened just before `from`, honouring
 * nested braces. -1 when unterminated.
 */
export function findClosingBrace(source: string, from: number): number {
  let depth = 1;
  for (let i = from; i < source.length; i++) {
    const ch = source[i];
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

class TemplateParser {
  private pos = 0;
  private text = "";
  private readonly parts: TemplatePart[] = [];

  constructor(private readonly source: string) {}

  parse(): TemplatePart[] {
    const s = this.source;

    while (this.pos < s.length) {
      if (s[this.pos] === "{" && this.expressionStartsAt(this.pos + 1)) {
        const open = this.pos;
        const expr = this.readExpression(open + 1);
        if (s[this.pos] !== "}") {
          throw new NotationSyntaxError(
            s,
            this.pos,
            `Expected "}" closing the embedded expression opened at ${open}`,
          );
        }
        this.pos++;
        this.push(expr);
      } else if (this.expressionStartsAt(this.pos)) {
        this.push(this.readExpression(this.pos));
      } else {
        this.text += s[this.pos];
        this.pos++;
      }
    }

    this.flushText();
    return this.parts;
  }

  private expressionStartsAt(index: number): boolean {
    return (
      this.source.startsWith(ATTR_OPEN, index) ||
      this.source.startsWith(VAR_OPEN, index)
    );
  }

  private push(expr: Expr): void {
    this.flushText();
    this.parts.push(expr);
  }

  private flushText(): void {
    if (this.text === "") return;
    this.parts.push({ kind: "text", value: this.text });
    this.text = "";
  }

  private readExpression(start: number): Expr {
    const s = this.source;
    const isAttr = s.startsWith(ATTR_OPEN, start);
    const bodyStart = start + (isAttr ? ATTR_OPEN.length : VAR_OPEN.length);
    const end = findClosingBrace(s, bodyStart);

    if (end < 0) {
      throw new NotationSyntaxError(s, start, "Unterminated expression");
    }

    const body = s.slice(bodyStart, end);
    const exprSource = s.slice(start, end + 1);
    const fail = (local: number, message: string): never => {
      throw new NotationSyntaxError(s, bodyStart + local, message);
    };

    this.pos = end + 1;
    return isAttr
      ? parseAttrBody(body, exprSource, fail)
      : parseVarBody(body, exprSource, fail);
  }
}

type Fail = (local: number, message: string) => never;

function parseAttrBody(body: string, source: string, fail: Fail): AttrExpr {
  const attrMatch = /^[A-Za-z_][\w-]*/.exec(body);
  if (!attrMatch) return fail(0, "Expected attribute name");

  const attribute = attrMatch[0];
  let i = attribute.length;
  let child: number | undefined;
  let context: ContextKind = "parent";
  let match: MatchMode = "first";
  let selector: string | undefined;

  if (body[i] === ":") {
    const m = /^:child\((\d+)\)/.exec(body.slice(i));
    if (!m) return fail(i, 'Expected ":child(n)"');
    child = Number(m[1]);
    if (child < 1) return fail(i, "Child positions start at 1");
    i += m[0].length;
  }

  if (body[i] === "<") {
    const m = /^<(page|parent)(?:\.(all|first))?>/.exec(body.slice(i));
    if (!m) return fail(i, 'Expected "<page>" or "<parent>" optionally followed by ".all" or ".first"');
    context = m[1] === "page" ? "page" : "parent";
    match = m[2] === "all" ? "all" : "first";
    i += m[0].length;
  }

  if (body[i] === "@") {
    i++;
    const end = findSectionEnd(body, i);
    selector = body.slice(i, end).trim();
    if (selector === "") return fail(i, "Empty selector");
    i = end;
  }

  const tail = parseTail(body, i, fail);
  if (tail.end !== body.length) {
    return fail(tail.end, `Unexpected "${body[tail.end]}"`);
  }

  const expr: AttrExpr = {
    kind: "attr",
    source,
    attribute,
    context,
    match,
    pipeline: tail.pipeline,
  };
  if (child !== undefined) expr.child = child;
  if (selector !== undefined) expr.selector = selector;
  if (tail.capture !== undefined) expr.capture = tail.capture;
  return expr;
}

function parseVarBody(body: string, source: string, fail: Fail): VarExpr {
  const nameMatch = /^[A-Za-z_]\w*/.exec(body);
  if (!nameMatch) return fail(0, "Expected variable name");

  const tail = parseTail(body, nameMatch[0].length, fail);
  if (tail.capture !== undefined) {
    return fail(tail.end, "Captures are only allowed in $attr{} expressions");
  }
  if (tail.end !== body.length) {
    return fail(tail.end, `Unexpected "${body[tail.end]}"`);
  }

  return { kind: "var", source, name: nameMatch[0], pipeline: tail.pipeline };
}

/** A selector or utility argument runs until the next "|" or ">>". */
function findSectionEnd(body: string, from: number): number {
  for (let i = from; i < body.length; i++) {
    if (body[i] === "|") return i;
    if (body[i] === ">" && body[i + 1] === ">") return i;
  }
  return body.length;
}

function parseTail(
  body: string,
  from: number,
  fail: Fail,
): { pipeline: UtilityCall[]; capture?: string; end: number } {
  const pipeline: UtilityCall[] = [];
  let i = from;

  while (body[i] === "|") {
    i++;
    const end = findSectionEnd(body, i);
    const segment = body.slice(i, end).trim();
    const m = /^([A-Za-z_]\w*)(?:\s+([\s\S]*))?$/.exec(segment);
    if (!m) return fail(i, "Expected utility name");

    const arg = m[2] === undefined ? "" : m[2].trim();
    pipeline.push(arg === "" ? { name: m[1] } : { name: m[1], arg });
    i = end;
  }

  if (body.startsWith(">>", i)) {
    const name = body.slice(i + 2).trim();
    if (!IDENTIFIER.test(name)) {
      return fail(i + 2, 'Expected variable name after ">>"');
    }
    return { pipeline, capture: name, end: body.length };
  }

  return { pipeline, end: i };
}
