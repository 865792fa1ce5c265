// ============================================================================
// Crawl error taxonomy
// ============================================================================

export type CrawlErrorCode =
  | "ELEMENT_NOT_FOUND"
  | "TIMEOUT"
  | "UNKNOWN_UTILITY"
  | "UNDEFINED_VARIABLE"
  | "KEY_MATCH_NOT_FOUND"
  | "SCOPE_RESOLUTION"
  | "NOTATION_SYNTAX"
  | "NOTATION_EVALUATION"
  | "DRIVER"
  | "CONFIG_VALIDATION";

/**
 * Base class for every error raised by the crawler. `code` is stable and
 * safe to switch on; `message` is for humans.
 */
export class CrawlError extends Error {
  readonly code: CrawlErrorCode;

  constructor(code: CrawlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CrawlError";
    this.code = code;
  }
}

export class ElementNotFoundError extends CrawlError {
  readonly selector: string;

  constructor(selector: string) {
    super("ELEMENT_NOT_FOUND", `Element not found: ${selector}`);
    this.name = "ElementNotFoundError";
    this.selector = selector;
  }
}

export class TimeoutError extends CrawlError {
  readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number, options?: { cause?: unknown }) {
    super("TIMEOUT", message, options);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownUtilityError extends CrawlError {
  readonly utility: string;

  constructor(utility: string) {
    super("UNKNOWN_UTILITY", `Unknown utility "${utility}"`);
    this.name = "UnknownUtilityError";
    this.utility = utility;
  }
}

export class UndefinedVariableError extends CrawlError {
  readonly variable: string;

  constructor(variable: string) {
    super("UNDEFINED_VARIABLE", `Undefined variable "${variable}"`);
    this.name = "UndefinedVariableError";
    this.variable = variable;
  }
}

export class KeyMatchNotFoundError extends CrawlError {
  constructor(segment: string) {
    super("KEY_MATCH_NOT_FOUND", `No entry matches ${segment} and creation is disabled for it`);
    this.name = "KeyMatchNotFoundError";
  }
}

export class ScopeResolutionError extends CrawlError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("SCOPE_RESOLUTION", `Cannot resolve scope "${path}": ${message}`);
    this.name = "ScopeResolutionError";
    this.path = path;
  }
}

export class NotationSyntaxError extends CrawlError {
  readonly source: string;
  readonly position: number;

  constructor(source: string, position: number, message: string) {
    super("NOTATION_SYNTAX", `${message} at position ${position} in "${source}"`);
    this.name = "NotationSyntaxError";
    this.source = source;
    this.position = position;
  }
}

export class NotationEvaluationError extends CrawlError {
  constructor(message: string) {
    super("NOTATION_EVALUATION", message);
    this.name = "NotationEvaluationError";
  }
}

export class DriverError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DRIVER", message, options);
    this.name = "DriverError";
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends CrawlError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      "CONFIG_VALIDATION",
      "Invalid crawl config:\n" +
        issues.map((i) => `  - ${i.path || "<root>"}: ${i.message}`).join("\n"),
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/** Normalize anything thrown into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
