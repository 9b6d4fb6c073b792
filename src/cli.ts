#!/usr/bin/env node

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { nodeHostProbe } from "./host/detector.js";
import { LocalToolRunner } from "./execution/runner.js";
import { ConsoleReporter } from "./shared/reporter.js";
import { BuildError } from "./shared/errors.js";
import { runPipeline } from "./pipeline/index.js";

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.debug({ configPath, fromFile }, "Configuration resolved");

  await runPipeline({
    config,
    probe: nodeHostProbe,
    runner: new LocalToolRunner(),
    reporter: new ConsoleReporter(),
    cwd: process.cwd(),
  });
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    const reporter = new ConsoleReporter();
    if (err instanceof BuildError) {
      logger.error({ code: err.code, context: err.context }, err.message);
      reporter.fail(err.message);
    } else {
      logger.fatal({ err }, "Unexpected failure");
      reporter.fail(err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
  },
);
