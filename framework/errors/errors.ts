/**
 * Framework Errors
 *
 * Every failure the dispatcher knows how to report carries a stable code
 * and the HTTP status it maps to.
 */

/**
 * Error codes reported in response bodies
 */
export const ErrorCodes = {
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  MISSING_PATH_PARAMETER: 'MISSING_PATH_PARAMETER',
  MISSING_QUERY_PARAMETER: 'MISSING_QUERY_PARAMETER',
  INVALID_PARAMETER_FORMAT: 'INVALID_PARAMETER_FORMAT',
  UNSUPPORTED_PARAMETER_TYPE: 'UNSUPPORTED_PARAMETER_TYPE',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  METHOD_NOT_SUPPORTED: 'METHOD_NOT_SUPPORTED',
  HANDLER_FAILED: 'HANDLER_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error for everything the framework raises on purpose
 */
export class FrameworkError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FrameworkError';
  }
}

/**
 * A runtime value has no JSON representation
 */
export class UnsupportedTypeError extends FrameworkError {
  constructor(public readonly typeName: string) {
    super(`Cannot convert value of type ${typeName} to JSON`, ErrorCodes.UNSUPPORTED_TYPE, 500, {
      type: typeName,
    });
    this.name = 'UnsupportedTypeError';
  }
}

/**
 * Client-caused failure while resolving a handler argument
 */
export class BindingError extends FrameworkError {
  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message, code, 400, details);
    this.name = 'BindingError';
  }
}

export class MissingPathParameterError extends BindingError {
  constructor(public readonly parameter: string) {
    super(`Path parameter '${parameter}' not found in route`, ErrorCodes.MISSING_PATH_PARAMETER, {
      parameter,
    });
    this.name = 'MissingPathParameterError';
  }
}

export class MissingQueryParameterError extends BindingError {
  constructor(public readonly parameter: string) {
    super(`Query parameter '${parameter}' is required`, ErrorCodes.MISSING_QUERY_PARAMETER, {
      parameter,
    });
    this.name = 'MissingQueryParameterError';
  }
}

export class InvalidParameterFormatError extends BindingError {
  constructor(
    public readonly parameter: string,
    public readonly expected: string,
    public readonly value: string
  ) {
    super(
      `Invalid ${expected} value for parameter '${parameter}'`,
      ErrorCodes.INVALID_PARAMETER_FORMAT,
      { parameter, expected, value }
    );
    this.name = 'InvalidParameterFormatError';
  }
}

export class UnsupportedParameterTypeError extends BindingError {
  constructor(public readonly parameter: string, public readonly type: string) {
    super(
      `Unsupported parameter type '${type}' for parameter '${parameter}'`,
      ErrorCodes.UNSUPPORTED_PARAMETER_TYPE,
      { parameter, type }
    );
    this.name = 'UnsupportedParameterTypeError';
  }
}

export class RouteNotFoundError extends FrameworkError {
  constructor(public readonly path: string) {
    super(`No route matches ${path}`, ErrorCodes.ROUTE_NOT_FOUND, 404, { path });
    this.name = 'RouteNotFoundError';
  }
}

export class MethodNotSupportedError extends FrameworkError {
  constructor(public readonly method: string) {
    super(`Method ${method} is not supported`, ErrorCodes.METHOD_NOT_SUPPORTED, 405, { method });
    this.name = 'MethodNotSupportedError';
  }
}

/**
 * Wraps whatever a handler threw
 */
export class HandlerInvocationError extends FrameworkError {
  constructor(public readonly route: string, cause: unknown) {
    super(`Handler for ${route} failed`, ErrorCodes.HANDLER_FAILED, 500, { route });
    this.name = 'HandlerInvocationError';
    this.cause = cause;
  }
}

/**
 * Normalize anything caught into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
