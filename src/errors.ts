/**
 * pubtrace Error Hierarchy
 *
 * Every error raised by the session layer, the tracing setup and the
 * commands extends PubtraceError and carries a stable code.
 *
 * @module errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - CONFIG_*: Configuration errors (1xxx)
 * - PATH_*: Path, path expression and selector errors (2xxx)
 * - VALUE_*: Payload encoding errors (3xxx)
 * - SESSION_*: Session and transport errors (4xxx)
 * - TRACING_*: Tracing setup errors (5xxx)
 */
export const ErrorCodes = {
  // Configuration errors (1xxx)
  CONFIG_NOT_FOUND: 'E1001',
  CONFIG_PARSE_ERROR: 'E1002',
  CONFIG_VALIDATION_ERROR: 'E1003',
  CONFIG_INVALID_MODE: 'E1004',
  CONFIG_NO_LOCATOR: 'E1005',

  // Path errors (2xxx)
  PATH_INVALID: 'E2001',
  PATH_EXPR_INVALID: 'E2002',
  SELECTOR_INVALID: 'E2003',

  // Value errors (3xxx)
  VALUE_DECODE_ERROR: 'E3001',
  VALUE_ENCODE_ERROR: 'E3002',

  // Session errors (4xxx)
  SESSION_OPEN_FAILED: 'E4001',
  SESSION_CLOSED: 'E4002',
  SESSION_TRANSPORT_ERROR: 'E4003',

  // Tracing errors (5xxx)
  TRACING_INIT_FAILED: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

interface ErrorOptions {
  code?: ErrorCode;
  suggestion?: string;
  details?: string[];
  cause?: Error;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all pubtrace errors
 */
export class PubtraceError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Suggested action for the user */
  readonly suggestion?: string;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      suggestion?: string;
      details?: string[];
      cause?: Error;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'PubtraceError';
    this.code = options.code;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }

  /**
   * Format error for display
   */
  toDisplayString(): string {
    let output = `${this.message} [${this.code}]`;
    if (this.details && this.details.length > 0) {
      output += '\n' + this.details.map((d) => `  - ${d}`).join('\n');
    }
    return output;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends PubtraceError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCodes.CONFIG_PARSE_ERROR,
      suggestion: options.suggestion ?? 'Check the session properties and command-line flags.',
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Properties file could not be read
 */
export class ConfigNotFoundError extends ConfigError {
  readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`Configuration file not found: ${filePath}`, {
      code: ErrorCodes.CONFIG_NOT_FOUND,
      suggestion: 'Pass an existing properties file with -c/--config.',
      cause,
    });
    this.name = 'ConfigNotFoundError';
    this.filePath = filePath;
  }
}

/**
 * Environment configuration failed validation
 */
export class ConfigValidationError extends ConfigError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Configuration validation failed', {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: issues,
      suggestion: 'Fix the environment variables listed above.',
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Path Errors
// ============================================================================

export class PathError extends PubtraceError {
  readonly input: string;

  constructor(message: string, options: ErrorOptions & { input: string }) {
    super(message, {
      code: options.code ?? ErrorCodes.PATH_INVALID,
      suggestion:
        options.suggestion ??
        'Paths are absolute and slash-separated, e.g. /demo/example/sensor',
      details: options.details,
      cause: options.cause,
    });
    this.name = 'PathError';
    this.input = options.input;
  }
}

// ============================================================================
// Value Errors
// ============================================================================

export class ValueError extends PubtraceError {
  readonly encoding?: string;

  constructor(message: string, options: ErrorOptions & { encoding?: string } = {}) {
    super(message, {
      code: options.code ?? ErrorCodes.VALUE_DECODE_ERROR,
      suggestion: options.suggestion,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ValueError';
    this.encoding = options.encoding;
  }
}

// ============================================================================
// Session Errors
// ============================================================================

export class SessionError extends PubtraceError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCodes.SESSION_TRANSPORT_ERROR,
      suggestion: options.suggestion,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'SessionError';
  }
}

/**
 * Operation attempted on a closed session or stream
 */
export class SessionClosedError extends SessionError {
  constructor(what: string = 'Session') {
    super(`${what} is closed`, { code: ErrorCodes.SESSION_CLOSED });
    this.name = 'SessionClosedError';
  }
}

// ============================================================================
// Tracing Errors
// ============================================================================

export class TracingError extends PubtraceError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? ErrorCodes.TRACING_INIT_FAILED,
      suggestion: options.suggestion ?? 'Check the OTEL_* and TRACE_* environment variables.',
      details: options.details,
      cause: options.cause,
    });
    this.name = 'TracingError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isPubtraceError(error: unknown): error is PubtraceError {
  return error instanceof PubtraceError;
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof PubtraceError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && error.code !== undefined) {
    return String(error.code);
  }
  return undefined;
}
