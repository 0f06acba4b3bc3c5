import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(DEBUG_MODE);

/**
 * Logger whose lines all start with `[scope]`.
 */
export function scopedLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => logger.debug(tag, ...args),
    log: (...args: unknown[]) => logger.log(tag, ...args),
    error: (...args: unknown[]) => logger.error(tag, ...args),
    warn: (...args: unknown[]) => logger.warn(tag, ...args),
    info: (...args: unknown[]) => logger.info(tag, ...args),
  };
}

export default logger;
