/**
 * Service Layer Exports
 *
 * Central export point for all services. Surfaces import from here ONLY.
 */

export { conversionService } from './conversionService.js';

export type {
  ConversionRequest,
  ConversionResult,
  ConversionService,
  StreamingLineSink,
} from './contracts.js';
