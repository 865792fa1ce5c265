import { z } from "zod";
import { ACTION_TYPES, type ReadyState } from "../driver/types.js";
import type { ComparisonOperator, Value } from "../notation/values.js";
import type {
  ActionSpec,
  BrowserType,
  InteractConfig,
  LinkRef,
  NodeConfig,
  RangeSpec,
  RepeatCondition,
  ValueSpec,
} from "./types.js";

/** Defaults a crawl config falls back to; the runtime config can override them. */
export interface CrawlDefaults {
  race: number;
  browser: BrowserType;
  timeout: number;
  repeatTimeout: number;
  readyOn: ReadyState;
  outputPath: string;
  outputName: string;
}

export const DEFAULT_CRAWL_DEFAULTS: CrawlDefaults = {
  race: 1,
  browser: "chromium",
  timeout: 30_000,
  repeatTimeout: 300_000,
  readyOn: "load",
  outputPath: "./",
  outputName: "trawl_output",
};

/** ---------- Values ---------- */
const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([ScalarSchema, z.array(ValueSchema)]),
);

type RawValueSpec = string | RawValueSpec[] | { [key: string]: RawValueSpec };

const RawValueSpecSchema: z.ZodType<RawValueSpec> = z.lazy(() =>
  z.union([z.string(), z.array(RawValueSpecSchema), z.record(RawValueSpecSchema)]),
);

export function toValueSpec(raw: RawValueSpec): ValueSpec {
  if (typeof raw === "string") return { kind: "scalar", template: raw };
  if (Array.isArray(raw)) return { kind: "list", items: raw.map(toValueSpec) };
  return {
    kind: "object",
    fields: Object.fromEntries(Object.entries(raw).map(([k, v]) => [k, toValueSpec(v)])),
  };
}

const ValueSpecSchema = RawValueSpecSchema.transform(toValueSpec);

/** ---------- Repeat ---------- */
const OPERATOR_ALIASES = new Map<string, ComparisonOperator>([
  ["=", "="],
  ["==", "="],
  ["equal", "="],
  ["is", "="],
  ["!=", "!="],
  ["not_equal", "!="],
  ["not", "!="],
  [">", ">"],
  ["greater_than", ">"],
  ["<", "<"],
  ["less_than", "<"],
  [">=", ">="],
  ["greater_than_or_equal", ">="],
  ["<=", "<="],
  ["less_than_or_equal", "<="],
]);

const OperatorSchema = z.string().transform((op, ctx): ComparisonOperator => {
  const resolved = OPERATOR_ALIASES.get(op);
  if (!resolved) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown operator "${op}"` });
    return z.NEVER;
  }
  return resolved;
});

const OperandSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const RepeatConditionSchema = z
  .object({
    value: z.string().min(1),
    while: z.tuple([OperatorSchema, OperandSchema]),
    default: OperandSchema.optional(),
  })
  .transform((c): RepeatCondition => {
    const condition: RepeatCondition = {
      value: c.value,
      operator: c.while[0],
      operand: c.while[1],
    };
    if (c.default !== undefined) condition.default = c.default;
    return condition;
  });

const RepeatSchema = z.union([
  z.number().int().nonnegative().transform((count) => ({ kind: "count" as const, count })),
  z
    .array(RepeatConditionSchema)
    .min(1)
    .transform((conditions) => ({ kind: "while" as const, conditions })),
]);

/** ---------- Node parts ---------- */
const RangeBoundSchema = z.union([z.number().int(), z.literal("_")]);

const RangeSchema = z
  .array(RangeBoundSchema)
  .max(3)
  .transform((bounds, ctx): RangeSpec => {
    const [start, stop, step] = bounds;
    const range: RangeSpec = { step: step === undefined || step === "_" ? 1 : step };
    if (range.step <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Range step must be positive" });
      return z.NEVER;
    }
    if (start !== undefined && start !== "_") range.start = start;
    if (stop !== undefined && stop !== "_") range.stop = stop;
    return range;
  });

const ActionSchema = z
  .object({
    type: z.enum(ACTION_TYPES),
    delay: z.number().nonnegative().optional(),
    wait: z.number().nonnegative().optional(),
    count: z.union([z.number().int().nonnegative(), z.string().min(1)]).default(1),
    screenshot: z.string().min(1).optional(),
    dispatch: z.boolean().default(false),
    value: z.string().optional(),
    key: z.string().min(1).optional(),
    options: z
      .object({
        button: z.enum(["left", "right", "middle"]).optional(),
        modifiers: z.array(z.enum(["Alt", "Control", "Meta", "Shift"])).optional(),
      })
      .default({}),
  })
  .superRefine((a, ctx) => {
    if (a.type === "type" && a.value === undefined && !a.dispatch) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'value is required for "type" actions',
        path: ["value"],
      });
    }
    if (a.type === "press" && a.key === undefined && !a.dispatch) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'key is required for "press" actions',
        path: ["key"],
      });
    }
  })
  .transform(({ options, ...rest }): ActionSpec => {
    const action: ActionSpec = { ...rest };
    if (options.button) action.button = options.button;
    if (options.modifiers) action.modifiers = options.modifiers;
    return action;
  });

const LinkSpecSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  metadata: z.record(z.string()).default({}),
});

const DataSpecSchema = z.object({
  scope: z.string().min(1),
  value: ValueSpecSchema,
  mode: z.enum(["merge", "append"]).optional(),
});

/** ---------- Recursive node tree ---------- */
export const NodeSchema: z.ZodType<NodeConfig, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1).optional(),
    selector: z.string().min(1),
    all: z.boolean().default(false),
    show: z.boolean().default(false),
    required: z.boolean().default(false),
    wait: z.number().int().nonnegative().optional(),
    contains: z.string().optional(),
    excludes: z.string().optional(),
    range: RangeSchema.optional(),
    actions: z.array(ActionSchema).default([]),
    links: z.array(LinkSpecSchema).default([]),
    data: z.array(DataSpecSchema).default([]),
    interact: InteractSchema.optional(),
  }),
);

export const InteractSchema: z.ZodType<InteractConfig, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    repeat: RepeatSchema.optional(),
    nodes: z
      .array(z.union([NodeSchema, z.array(NodeSchema).min(1)]))
      .min(1)
      .transform((entries) => entries.map((e) => (Array.isArray(e) ? e : [e]))),
  }),
);

/** ---------- Pages ---------- */
const LinkEntrySchema = z.union([
  z.string().min(1),
  z.object({
    url: z.string().min(1),
    metadata: z.record(ValueSchema).default({}),
  }),
]);

function toLinkRef(entry: z.infer<typeof LinkEntrySchema>): LinkRef {
  if (typeof entry !== "string") return { kind: "url", url: entry.url, metadata: entry.metadata };
  if (entry.startsWith("$")) return { kind: "group", name: entry.slice(1) };
  return { kind: "url", url: entry, metadata: {} };
}

export const PageSchema = z.object({
  link: z
    .union([LinkEntrySchema, z.array(LinkEntrySchema).min(1)])
    .transform((link) => (Array.isArray(link) ? link : [link]).map(toLinkRef)),
  vars: z.record(ValueSchema).default({}),
  interact: InteractSchema.optional(),
});

/** ---------- Root ---------- */
export function crawlConfigSchema(defaults: CrawlDefaults = DEFAULT_CRAWL_DEFAULTS) {
  return z.object({
    race: z.number().int().positive().default(defaults.race),
    vars: z.record(ValueSchema).default({}),
    browser: z
      .object({
        type: z.enum(["chromium", "firefox", "webkit"]).default(defaults.browser),
        show: z.boolean().default(false),
        slowdown: z.number().nonnegative().optional(),
        viewport: z.tuple([z.number().int().positive(), z.number().int().positive()]).optional(),
        timeout: z.number().int().positive().default(defaults.timeout),
        readyOn: z
          .enum(["load", "domcontentloaded", "networkidle", "commit"])
          .default(defaults.readyOn),
        repeatTimeout: z.number().int().positive().default(defaults.repeatTimeout),
      })
      .default({}),
    keyMatch: z
      .object({ create: z.enum(["equality", "always", "never"]).default("equality") })
      .default({}),
    output: z
      .object({
        path: z.string().default(defaults.outputPath),
        name: z.string().min(1).default(defaults.outputName),
        formats: z.array(z.enum(["json"])).default([]),
      })
      .default({}),
    pages: z.array(PageSchema).default([]),
  });
}
