#!/usr/bin/env node
import { ConfigValidationError, toError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import { playwrightDriver, Trawl } from "../trawl.js";
import { loadCrawlDefinition, parseArgs, resolveConfig } from "./cli.js";

async function main(): Promise<number> {
  const args = parseArgs(process.argv);
  const config = resolveConfig(args.configOverrides);
  const logger = createLogger(config.logLevel);

  try {
    const definition = await loadCrawlDefinition(args);
    const trawl = new Trawl(definition, { driver: playwrightDriver, config, logger });
    await trawl.run();
    return 0;
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      logger.error({ issues: err.issues }, "Invalid crawl definition");
    } else {
      logger.error({ err: toError(err) }, "Crawl aborted");
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(toError(err).message);
    process.exitCode = 1;
  },
);
