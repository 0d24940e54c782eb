/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "AUTH_FAILED")
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

export type NetworkErrorCode = 'HTTP_STATUS' | 'TIMEOUT' | 'NETWORK_ERROR';

/**
 * Transport failure, timeout or non-2xx response. Recoverable: the caller
 * may retry or drop the one item in a batch.
 */
export class NetworkError extends AppError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(message: string, code: NetworkErrorCode, url: string, statusCode?: number) {
    super(message, code);
    this.url = url;
    this.statusCode = statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Malformed JSON or a payload/page of unexpected shape. Judges treat it
 * as "no data".
 */
export class ParseError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'PARSE_ERROR');
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
    };
  }
}

export type PlatformErrorCode = 'AUTH_FAILED' | 'NO_BROWSER_COOKIES';

/**
 * Authentication exhausted or no browser holds cookies for the domain.
 * Terminal for the fetch that raised it.
 */
export class PlatformError extends AppError {
  public readonly domain: string;

  constructor(message: string, code: PlatformErrorCode, domain: string) {
    super(message, code);
    this.domain = domain;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      domain: this.domain,
    };
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * Errors a judge turns into an empty result instead of failing the caller.
 */
export function isSoftFailure(error: unknown): error is NetworkError | ParseError {
  return error instanceof NetworkError || error instanceof ParseError;
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). The CLI uses it to decide between a
 * one-line report and a logged stack trace.
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
