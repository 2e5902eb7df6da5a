/**
 * Errors
 *
 * Typed failures with their status mapping.
 */

export {
  ErrorCodes,
  FrameworkError,
  UnsupportedTypeError,
  BindingError,
  MissingPathParameterError,
  MissingQueryParameterError,
  InvalidParameterFormatError,
  UnsupportedParameterTypeError,
  RouteNotFoundError,
  MethodNotSupportedError,
  HandlerInvocationError,
  toError,
  type ErrorCode,
} from './errors.ts';
