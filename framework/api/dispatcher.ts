/**
 * Dispatcher
 *
 * One request, start to finish: method check, route match, argument
 * binding, handler call, JSON inference. Every outcome becomes a JSON
 * response with its own status; nothing is rethrown to the transport.
 */

import { randomUUID } from 'node:crypto';
import { bindArguments } from '../binding/binder.ts';
import { parseQueryString } from '../binding/query.ts';
import {
  HandlerInvocationError,
  MethodNotSupportedError,
  RouteNotFoundError,
  UnsupportedTypeError,
  toError,
  type FrameworkError,
} from '../errors/errors.ts';
import { inferJson } from '../json/infer.ts';
import type { JsonValue } from '../json/value.ts';
import type { RouteTable } from '../router/router.ts';
import { createRequestLogger, getLogger, type Logger } from '../telemetry/logger.ts';
import { SpanKind, withSpan, type Span } from '../telemetry/otel.ts';
import {
  errorResponse,
  HttpStatus,
  jsonResponse,
  type DispatchRequest,
  type JsonResponse,
} from './response.ts';

export interface DispatcherOptions {
  logger?: Logger;
  /** The only accepted method (default: GET) */
  method?: string;
}

export class Dispatcher {
  private logger: Logger;
  private method: string;

  constructor(
    readonly table: RouteTable,
    options: DispatcherOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.method = options.method ?? 'GET';
  }

  /**
   * Handle a request
   */
  dispatch(request: DispatchRequest): Promise<JsonResponse> {
    return withSpan(
      `${request.method} ${request.path}`,
      async (span) => {
        const response = await this.run(request, span);
        span.setAttribute('http.status_code', response.statusCode);
        return response;
      },
      {
        kind: SpanKind.SERVER,
        attributes: { 'http.method': request.method, 'http.target': request.path },
      }
    );
  }

  private async run(request: DispatchRequest, span: Span): Promise<JsonResponse> {
    const logger = createRequestLogger(this.logger, {
      requestId: randomUUID(),
      method: request.method,
      path: request.path,
    });

    if (request.method !== this.method) {
      return reject(new MethodNotSupportedError(request.method), logger);
    }

    const match = this.table.match(request.path);
    if (!match) {
      return reject(new RouteNotFoundError(request.path), logger);
    }
    span.setAttribute('http.route', match.route.template);

    const bound = bindArguments(match.route.bindings, {
      template: match.route.template,
      segments: match.segments,
      query: parseQueryString(request.queryString),
    });
    if (!bound.success) {
      return reject(bound.error, logger);
    }

    let result: unknown;
    try {
      result = await match.route.handler(...bound.args);
    } catch (error) {
      return fail(new HandlerInvocationError(match.route.template, error), error, logger);
    }

    let body: JsonValue;
    try {
      body = inferJson(result);
    } catch (error) {
      const failure =
        error instanceof UnsupportedTypeError
          ? error
          : new HandlerInvocationError(match.route.template, error);
      return fail(failure, error, logger);
    }

    logger.debug('Request handled', { route: match.route.template });
    return jsonResponse(HttpStatus.OK, body);
  }
}

/**
 * Expected, client-correctable outcome
 */
function reject(error: FrameworkError, logger: Logger): JsonResponse {
  logger.warn(error.message, { code: error.code, status: error.status });
  return errorResponse(error);
}

/**
 * Handler threw, or its result has no JSON form
 */
function fail(error: FrameworkError, cause: unknown, logger: Logger): JsonResponse {
  logger.error('Request failed', toError(cause), { code: error.code });
  return errorResponse(error);
}
