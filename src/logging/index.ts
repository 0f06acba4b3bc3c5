/**
 * Logging Module
 *
 * Centralized logging for the entire application.
 * All logging MUST go through this module.
 */

export { default as logger, scopedLogger } from './logger.js';
export { logRequest, logResponse } from './requestLogger.js';
