export type {
  AttrExpr,
  ContextKind,
  Expr,
  MatchMode,
  Template,
  TemplatePart,
  UtilityCall,
  VarExpr,
} from "./ast.js";
export { singleExpression } from "./ast.js";
export {
  findClosingBrace,
  parseExpression,
  parseTemplate,
} from "./parser.js";
export {
  evaluateExpression,
  evaluateTemplate,
  interpolateVars,
  toText,
  type EvaluateOptions,
  type PageContext,
} from "./evaluator.js";
export {
  UtilityRegistry,
  defaultUtilities,
  extractNumber,
  slugify,
  type UtilityContext,
  type UtilityFn,
} from "./utilities.js";
export {
  COMPARISON_OPERATORS,
  compareScalars,
  flattenValue,
  isComparisonOperator,
  parseNumeric,
  scalarToString,
  type ComparisonOperator,
  type Scalar,
  type Value,
} from "./values.js";
