/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - HTTP status code mapping
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Resource Errors (4xx)
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  RESOURCE_CONFLICT = 'RESOURCE_CONFLICT',
  RESOURCE_UNPROCESSABLE = 'RESOURCE_UNPROCESSABLE',

  // File System Errors (5xx - operational)
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  // Provider Errors (5xx - operational)
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',

  // Service state (5xx - operational)
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors (5xx)
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
  SYSTEM_TIMEOUT = 'SYSTEM_TIMEOUT',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'importInbox', 'writeCover') */
  operation?: string;

  /** Entity type being operated on (e.g., 'album', 'track') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ResourceNotFoundError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      { ...context, entityType: resourceType, entityId: resourceId }
    );
  }
}

/**
 * Another holder owns the resource (e.g. the import lease)
 */
export class ConflictError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} is busy`,
      ErrorCode.RESOURCE_CONFLICT,
      409,
      { ...context, entityType: resourceType }
    );
  }
}

export class UnprocessableError extends ResourceError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.RESOURCE_UNPROCESSABLE, 422, context);
  }
}

// ============================================
// OPERATIONAL ERRORS (5xx)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      500,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// Provider Errors (companion download service, art archive)
export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      502,
      httpStatusCode >= 500,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(
    providerName: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider unavailable: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_UNAVAILABLE,
      503,
      true,
      context,
      cause
    );
  }
}

/**
 * A component is disabled (e.g. its watch root was missing at startup)
 */
export class ServiceUnavailableError extends OperationalError {
  constructor(
    public readonly component: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Service unavailable: ${component}`,
      ErrorCode.SERVICE_UNAVAILABLE,
      503,
      false,
      { ...context, service: component }
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

// ============================================
// SYSTEM ERRORS
// ============================================

/**
 * External command failed. Operational: a failing tagger run is expected,
 * and the message (captured output) is safe to show to API callers.
 */
export class ProcessError extends OperationalError {
  constructor(
    public readonly processName: string,
    public readonly exitCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Process '${processName}' failed with exit code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      500,
      false,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}

export class TimeoutError extends OperationalError {
  constructor(
    public readonly timeoutMs: number,
    operation: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${operation} timed out after ${timeoutMs}ms`,
      ErrorCode.SYSTEM_TIMEOUT,
      504,
      true,
      { ...context, operation, durationMs: timeoutMs }
    );
  }
}
