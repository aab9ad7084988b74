#!/usr/bin/env node
/**
 * tendril - orchestration runtime for an LLM agent.
 */

import { createProgram } from "./cli/commands.js";
import logger from "./utils/logger.js";

createProgram()
  .parseAsync()
  .catch((error) => {
    logger.error({ error }, "Fatal error");
    process.exitCode = 1;
  });
