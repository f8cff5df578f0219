#!/usr/bin/env node
/**
 * Gateway CLI
 *
 * Run the gateway daemon from the command line.
 */

import { Logger } from "@switchyard/kernel";
import { runGateway } from "./cli.js";

const log = Logger.for("CLI");

runGateway(process.argv.slice(2)).catch((error: unknown) => {
  log.fatal({ err: error }, error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
