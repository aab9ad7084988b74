/**
 * Shared pino logger.
 *
 * Logs go to stderr so that CLI output on stdout stays clean.
 */

import pino from "pino";

const logger = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    base: { service: "tendril" },
  },
  pino.destination(2),
);

export default logger;
