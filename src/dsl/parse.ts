import type { ZodIssue } from "zod";
import { ConfigValidationError, NotationSyntaxError, type ConfigIssue } from "../errors.js";
import { parseTemplate } from "../notation/parser.js";
import { parseScopePath } from "../scope/keypath.js";
import { crawlConfigSchema, DEFAULT_CRAWL_DEFAULTS, type CrawlDefaults } from "./schema.js";
import type { CrawlConfig, InteractConfig, NodeConfig, ValueSpec } from "./types.js";

/**
 * Validate a raw crawl definition and fill in defaults. Every template and
 * scope path is parsed up front, so notation syntax errors surface here with
 * the config path they came from rather than mid-crawl.
 */
export function parseCrawlConfig(
  data: unknown,
  defaults: CrawlDefaults = DEFAULT_CRAWL_DEFAULTS,
): CrawlConfig {
  const result = crawlConfigSchema(defaults).safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map(toConfigIssue));
  }

  const config: CrawlConfig = result.data;
  const issues: ConfigIssue[] = [];
  config.pages.forEach((page, i) => {
    page.link.forEach((link, j) => {
      if (link.kind === "group" && link.name === "") {
        issues.push({ path: `pages.${i}.link.${j}`, message: "Link reference has no group name" });
      }
    });
    if (page.interact) checkInteract(page.interact, `pages.${i}.interact`, issues);
  });

  if (issues.length > 0) throw new ConfigValidationError(issues);
  return config;
}

function toConfigIssue(issue: ZodIssue): ConfigIssue {
  return { path: issue.path.join("."), message: issue.message };
}

// ---------------------------------------------------------------------------
// Notation pre-parse
// ---------------------------------------------------------------------------

function checkInteract(interact: InteractConfig, path: string, issues: ConfigIssue[]): void {
  if (interact.repeat?.kind === "while") {
    interact.repeat.conditions.forEach((c, i) => {
      checkTemplate(c.value, `${path}.repeat.${i}.value`, issues);
    });
  }
  interact.nodes.forEach((alternatives, i) => {
    alternatives.forEach((node, j) => {
      const at = alternatives.length > 1 ? `${path}.nodes.${i}.${j}` : `${path}.nodes.${i}`;
      checkNode(node, at, issues);
    });
  });
}

function checkNode(node: NodeConfig, path: string, issues: ConfigIssue[]): void {
  node.actions.forEach((action, i) => {
    const at = `${path}.actions.${i}`;
    if (typeof action.count === "string") checkTemplate(action.count, `${at}.count`, issues);
    if (action.screenshot !== undefined) checkTemplate(action.screenshot, `${at}.screenshot`, issues);
    if (action.value !== undefined) checkTemplate(action.value, `${at}.value`, issues);
  });

  node.links.forEach((link, i) => {
    const at = `${path}.links.${i}`;
    checkTemplate(link.url, `${at}.url`, issues);
    for (const [key, template] of Object.entries(link.metadata)) {
      checkTemplate(template, `${at}.metadata.${key}`, issues);
    }
  });

  node.data.forEach((data, i) => {
    const at = `${path}.data.${i}`;
    check(() => parseScopePath(data.scope), `${at}.scope`, issues);
    checkValueSpec(data.value, `${at}.value`, issues);
  });

  if (node.interact) checkInteract(node.interact, `${path}.interact`, issues);
}

function checkValueSpec(spec: ValueSpec, path: string, issues: ConfigIssue[]): void {
  switch (spec.kind) {
    case "scalar":
      checkTemplate(spec.template, path, issues);
      return;
    case "list":
      spec.items.forEach((item, i) => checkValueSpec(item, `${path}.${i}`, issues));
      return;
    case "object":
      for (const [key, field] of Object.entries(spec.fields)) {
        checkValueSpec(field, `${path}.${key}`, issues);
      }
  }
}

function checkTemplate(source: string, path: string, issues: ConfigIssue[]): void {
  check(() => parseTemplate(source), path, issues);
}

function check(parse: () => unknown, path: string, issues: ConfigIssue[]): void {
  try {
    parse();
  } catch (err) {
    if (!(err instanceof NotationSyntaxError)) throw err;
    issues.push({ path, message: err.message });
  }
}
