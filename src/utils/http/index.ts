/**
 * HTTP Module
 *
 * HTTP-related utilities shared by the conversion server handlers.
 */

export {
  detectHTTPError,
  extractErrorMessage,
  handleStreamingError,
  sendHTTPError,
} from './errorResponseHandler.js';
export type { HTTPErrorResponse } from './errorResponseHandler.js';
