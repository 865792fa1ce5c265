// ============================================================================
// Notation AST
// ============================================================================
//
//   $attr{text:child(2)<page.all>@ul.items li|trim|prepend #>>labels}
//         ^^^^ ^^^^^^^^ ^^^^^^^^^ ^^^^^^^^^^^^^^^^^^^^^^^^^ ^^^^^^^^
//         attr  child    context   selector   pipeline      capture
//
//   $var{name|uppercase}
//

export type ContextKind = "parent" | "page";

export type MatchMode = "first" | "all";

export interface UtilityCall {
  name: string;
  arg?: string;
}

export interface AttrExpr {
  kind: "attr";
  source: string;
  attribute: string;
  /** 1-indexed position among the element's child nodes */
  child?: number;
  context: ContextKind;
  match: MatchMode;
  selector?: string;
  pipeline: UtilityCall[];
  capture?: string;
}

export interface VarExpr {
  kind: "var";
  source: string;
  name: string;
  pipeline: UtilityCall[];
}

export type Expr = AttrExpr | VarExpr;

export interface TextPart {
  kind: "text";
  value: string;
}

export type TemplatePart = TextPart | Expr;

export interface Template {
  source: string;
  parts: TemplatePart[];
}

/** The template's only part, when it is one expression with no surrounding text. */
export function singleExpression(template: Template): Expr | null {
  const [only] = template.parts;
  return template.parts.length === 1 && only.kind !== "text" ? only : null;
}
