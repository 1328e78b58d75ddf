/**
 * Barrel export for the typed error hierarchy and error handler.
 */

export {
  IesError,
  ResourceError,
  StructureError,
  NumericFormatError,
  ValidationError,
  SerializationError,
  ConfigurationError,
} from './ies-error.js';

export { ErrorHandler } from './error-handler.js';
export type { Outcome } from './error-handler.js';
