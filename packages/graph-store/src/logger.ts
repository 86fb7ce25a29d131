import pino from "pino";
import { config } from "./config/env";

/**
 * Process-wide logger. Owned by the host (the CLI); library functions only
 * log through a logger handed to them.
 */
export const logger = pino({
  level: config.logLevel
});
