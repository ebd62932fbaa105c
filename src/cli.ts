#!/usr/bin/env node
/**
 * CLI: screen ticker codes for early volume breakouts.
 *
 * Usage:
 *   npx tsx src/cli.ts --codes 7203,6758,9984
 *   npx tsx src/cli.ts --file codes.txt --min-spike-ratio 2.5 --csv
 */

import { createScreenCommand } from "./cli/screen-command.js";
import { logger } from "./logging.js";

createScreenCommand()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.fatal({ err }, "Screen failed");
    process.exitCode = 1;
  });
