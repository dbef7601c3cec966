#!/usr/bin/env node
// src/index.ts
import { runCli } from "./cli.js";
import { JsonLogger, LogEvents, logger } from "./logger.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    logger.error(LogEvents.CLI_ERROR, { error: JsonLogger.sanitizeErrorMessage(e) });
    console.error(e);
    process.exit(1);
  });
