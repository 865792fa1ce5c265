// ---------------------------------------------------------------------------
// Runtime values produced by notation evaluation
// ---------------------------------------------------------------------------

export type Scalar = string | number | boolean | null;

/** Whatever a notation expression can evaluate to. */
export type Value = Scalar | Value[];

export const COMPARISON_OPERATORS = ["!=", ">=", "<=", "=", ">", "<"] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export function isComparisonOperator(op: string): op is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(op);
}

/**
 * Parse a value as a number only when the whole value is numeric
 * ("12", " 3.5 ", 7). Returns null for anything else, including "".
 */
export function parseNumeric(value: Scalar): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** String form used for interpolation and string comparison. */
export function scalarToString(value: Scalar): string {
  return value === null ? "" : String(value);
}

/**
 * Compare two scalars. Numeric comparison when both sides are numeric,
 * string comparison otherwise.
 */
export function compareScalars(
  left: Scalar,
  op: ComparisonOperator,
  right: Scalar,
): boolean {
  const ln = parseNumeric(left);
  const rn = parseNumeric(right);

  if (ln !== null && rn !== null) {
    return compareOrdered(ln, op, rn);
  }
  return compareOrdered(scalarToString(left), op, scalarToString(right));
}

function compareOrdered<T extends string | number>(
  a: T,
  op: ComparisonOperator,
  b: T,
): boolean {
  switch (op) {
    case "=":
      return a === b;
    case "!=":
      return a !== b;
    case ">":
      return a > b;
    case "<":
      return a < b;
    case ">=":
      return a >= b;
    case "<=":
      return a <= b;
  }
}

/** Flatten nested lists into a flat list of scalars. */
export function flattenValue(value: Value): Scalar[] {
  if (!Array.isArray(value)) return [value];
  return value.flatMap((v) => flattenValue(v));
}
