import { readFile } from "node:fs/promises";
import type { LogLevel, TrawlConfig } from "../types/index.js";
import { defaultConfig } from "../../config/default.js";

export interface CliArgs {
  crawlFile: string;
  configOverrides?: Partial<Pick<TrawlConfig, "logLevel">>;
}

export const USAGE = "Usage: trawl <crawl.json> [--log-level <level>]";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function parseArgs(argv: string[]): CliArgs {
  const rest = argv.slice(2);
  let crawlFile: string | undefined;
  let logLevel: LogLevel | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--log-level") {
      const value = rest[++i];
      logLevel = LOG_LEVELS.find((level) => level === value);
      if (!logLevel) throw new Error(`Unknown log level "${value ?? ""}"\n${USAGE}`);
    } else if (crawlFile === undefined && !arg.startsWith("-")) {
      crawlFile = arg;
    } else {
      throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
    }
  }

  if (!crawlFile) throw new Error(USAGE);
  return logLevel ? { crawlFile, configOverrides: { logLevel } } : { crawlFile };
}

/** Read the crawl definition; validation happens when the crawl is built. */
export async function loadCrawlDefinition(args: CliArgs): Promise<unknown> {
  const raw = await readFile(args.crawlFile, "utf-8");
  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch (err) {
    throw new Error(`${args.crawlFile} is not valid JSON`, { cause: err });
  }
}

export function resolveConfig(overrides?: CliArgs["configOverrides"]): TrawlConfig {
  if (!overrides) return defaultConfig;
  return { ...defaultConfig, ...overrides };
}
