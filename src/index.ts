#!/usr/bin/env node

import { runCli } from "./cli.js";
import { validateConfig } from "./config.js";
import { logger } from "./logging/index.js";

validateConfig();

runCli(process.argv.slice(2), process.stdin, process.stdout)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Unexpected failure:", error instanceof Error ? error.stack ?? error.message : String(error));
    process.exitCode = 1;
  });
