#!/usr/bin/env node

/**
 * Command-line interface for md2html.
 */

import { hideBin } from "yargs/helpers"
import { run } from "./app.js"
import { logger } from "./logger.js"

run(hideBin(process.argv))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, "Fatal error occurred")
    process.exitCode = 1
  })
