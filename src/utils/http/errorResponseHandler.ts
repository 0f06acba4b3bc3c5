/**
 * Error Response Handler - SSOT for HTTP Error Handling
 *
 * SSOT Compliance:
 * - All error-to-status mapping lives here
 * - All error response formatting lives here
 */

import { isPairStreamError } from '../../engine/errors.js';
import { logger } from '../../logging/index.js';

import type { Response } from 'express';

/**
 * HTTP error response format
 */
export interface HTTPErrorResponse {
  error: string;
  message: string;
  statusCode: number;
}

/**
 * Extracts error message from unknown error type
 * SSOT for error message extraction
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  if (error instanceof Error) {
    return error.message || 'Unknown error';
  }

  if (typeof error === 'string') {
    return error.trim() || 'Unknown error (empty string)';
  }

  try {
    const stringified = JSON.stringify(error);
    if (stringified && stringified !== '{}' && stringified !== '[]') {
      return `Error details: ${stringified}`;
    }
  } catch {
    // JSON.stringify failed, fall through to default
  }

  return 'Unknown error';
}

/**
 * Maps engine errors to HTTP status codes
 * SSOT for error-to-status-code mapping
 */
export function detectHTTPError(error: unknown): HTTPErrorResponse {
  const message = extractErrorMessage(error);

  if (isPairStreamError(error)) {
    switch (error.code) {
      case 'PROFILE':
        return { error: 'Not Found', message, statusCode: 404 };
      case 'STREAM_READ':
        return { error: 'Bad Request', message, statusCode: 400 };
      case 'OUTPUT_CLOSED':
        return { error: 'Client Closed Request', message, statusCode: 499 };
      case 'QUEUE_EXHAUSTED':
        return { error: 'Insufficient Storage', message, statusCode: 507 };
    }
  }

  return { error: 'Internal Server Error', message, statusCode: 500 };
}

/**
 * Sends an HTTP error response (for non-streaming handlers)
 *
 * @param context - Error context for logging (e.g., "CONVERT")
 */
export function sendHTTPError(res: Response, error: unknown, context: string): void {
  logger.error(`[${context}] Error:`, extractErrorMessage(error));

  const httpError = detectHTTPError(error);

  res.status(httpError.statusCode).json({
    error: httpError.error,
    message: httpError.message,
  });
}

/**
 * Handles an error in the middle of a streamed response
 *
 * - Sends error JSON (if nothing was written yet)
 * - Aborts the response (if records were already sent), so the client sees
 *   a broken transfer instead of a complete 200 body
 * - Logs only (if the response already ended or was destroyed)
 *
 * @returns the status code that was sent, or undefined when the response
 *          went out as 200 and was aborted
 */
export function handleStreamingError(res: Response, error: unknown, context: string): number | undefined {
  const httpError = detectHTTPError(error);

  if (!res.headersSent) {
    sendHTTPError(res, error, context);
    return httpError.statusCode;
  }

  if (res.writableEnded || res.destroyed) {
    logger.error(`[${context}] ${httpError.message}. Response already closed.`);
  } else {
    logger.error(`[${context}] ${httpError.message}. Headers already sent, aborting response.`);
    res.destroy(error instanceof Error ? error : new Error(httpError.message));
  }
  return undefined;
}
