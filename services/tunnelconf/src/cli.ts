#!/usr/bin/env node
import { appLogger, normalizeError } from "./observability/logger.js";
import { runCli } from "./cli/program.js";

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    appLogger.fatal({ event: "cli.crashed", err: normalizeError(error) }, "tunnelconf crashed");
    process.exitCode = 1;
  });
