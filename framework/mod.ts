/**
 * jsonroute
 *
 * A small read-only JSON API framework: a JSON value tree with visitors,
 * inference from runtime values, and a path-template dispatcher.
 *
 * @module jsonroute
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

// JSON model
export {
  JsonValue,
  JsonObject,
  JsonArray,
  JsonString,
  JsonNumber,
  JsonBoolean,
  JsonNull,
  isJsonValue,
  quoteJsonString,
  inferJson,
  isJsonDescribable,
  EnumCase,
  JsonValidator,
  PrettyPrintVisitor,
  DebugVisitor,
  ArrayTypeChecker,
  type JsonKind,
  type JsonEntry,
  type JsonVisitor,
  type JsonDescribable,
  type ValidationIssue,
  type ValidationIssueKind,
  type ArrayElementKind,
} from './json/mod.ts';

// Routing
export {
  Router,
  RouteTable,
  RouteGroup,
  joinTemplate,
  matchTemplate,
  parsePathParams,
  buildPath,
  type RouteDefinition,
  type RouteMatch,
  type RouteHandler,
  type RouteOptions,
  type PatternParams,
} from './router/mod.ts';

// Parameter binding
export {
  pathParam,
  queryParam,
  bindArguments,
  parseQueryString,
  coerceParam,
  type ParamBinding,
  type ParamType,
  type BoundValue,
  type BindResult,
} from './binding/mod.ts';

// Dispatch
export {
  Dispatcher,
  jsonResponse,
  apiError,
  errorResponse,
  renderResponse,
  HttpStatus,
  type DispatcherOptions,
  type DispatchRequest,
  type JsonResponse,
  type RenderedResponse,
} from './api/mod.ts';

// HTTP
export { Server, parseRequestTarget, type ServerOptions } from './http/mod.ts';

// Errors
export * from './errors/mod.ts';

// Configuration
export { Config, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  formatLogEntry,
  withSpan,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type LogSink,
} from './telemetry/mod.ts';
