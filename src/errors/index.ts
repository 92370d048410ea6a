/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation and resource errors (4xx)
export {
  ValidationError,
  ResourceError,
  ResourceNotFoundError,
  ConflictError,
  UnprocessableError,
} from './ApplicationError.js';

// Operational errors (5xx)
export {
  OperationalError,
  FileSystemError,
  ProviderError,
  ProviderServerError,
  ProviderUnavailableError,
  ServiceUnavailableError,
  ProcessError,
  TimeoutError,
} from './ApplicationError.js';

// Permanent errors (5xx - not retryable)
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';
