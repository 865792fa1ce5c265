import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import pino from "pino";
import type { CrawlResult, OutputSink } from "./sink.js";

/**
 * Reshape the selected part of the result before it is written. Returning
 * null or undefined skips the write (the hook wrote the file itself).
 */
export type OutputTransform = (value: unknown, path: string) => unknown;

export interface JsonFileSinkOptions {
  /** Full file path, e.g. `./out/products.json` */
  path: string;
  /** Which part of the result to write */
  state?: "data" | "links" | "report";
  transform?: OutputTransform;
  /** Indentation of the written JSON */
  indent?: number;
}

export class JsonFileSink implements OutputSink {
  readonly name = "JSON";
  private logger: pino.Logger;

  constructor(
    private readonly options: JsonFileSinkOptions,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "trawl.output" });
  }

  async write(result: CrawlResult): Promise<string | null> {
    const { path, transform, indent = 2 } = this.options;
    const state = this.options.state ?? "data";

    const value = transform ? transform(result[state], path) : result[state];
    if (value === null || value === undefined) {
      this.logger.info({ path, state }, "Transform handled the output, nothing written");
      return null;
    }

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(value, null, indent) + "\n", "utf-8");
    this.logger.info({ path, state }, `Wrote ${state} to JSON`);
    return path;
  }
}

/** `<path><name>.json`, joined the way the output config spells it. */
export function jsonOutputPath(dir: string, name: string): string {
  return `${dir}${name}.json`;
}
