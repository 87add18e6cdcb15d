/**
 * Instrumentation Errors
 *
 * Errors raised by the instrumentation layer itself. Errors thrown by the
 * operations it wraps (publish, consume handlers, HTTP calls) are never
 * wrapped in these; they reach the caller unchanged.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  CONFIG_INVALID: 'E1001',
  EXPORT_FAILED: 'E2001',
  EXPORT_TIMEOUT: 'E2002',
  TOPOLOGY_INVALID: 'E3001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base class for errors originating inside the instrumentation layer
 */
export class InstrumentationError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'InstrumentationError';
    this.code = code;
  }
}

/**
 * Environment configuration failed validation
 */
export class ConfigurationError extends InstrumentationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.join('\n')}`, ErrorCodes.CONFIG_INVALID);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A batch could not be delivered to the collector
 */
export class ExportError extends InstrumentationError {
  readonly status?: number;

  constructor(
    message: string,
    options: { status?: number; cause?: unknown; code?: ErrorCode } = {}
  ) {
    super(message, options.code ?? ErrorCodes.EXPORT_FAILED, { cause: options.cause });
    this.name = 'ExportError';
    this.status = options.status;
  }
}

/**
 * Retry topology arguments are unusable
 */
export class TopologyError extends InstrumentationError {
  constructor(message: string) {
    super(message, ErrorCodes.TOPOLOGY_INVALID);
    this.name = 'TopologyError';
  }
}

/**
 * Normalize an unknown thrown value for logging and span recording
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
