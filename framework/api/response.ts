/**
 * API Response Utilities
 *
 * What the dispatcher hands back to the transport, and how it becomes
 * bytes on the wire.
 */

import type { FrameworkError } from '../errors/errors.ts';
import { JsonObject, JsonString, type JsonValue } from '../json/value.ts';

/**
 * Request as seen by the dispatcher
 */
export interface DispatchRequest {
  method: string;
  /** Path without the query string */
  path: string;
  /** Raw query string, without the leading '?' */
  queryString: string;
}

export interface JsonResponse {
  statusCode: number;
  body: JsonValue;
  headers: Record<string, string>;
}

export interface RenderedResponse {
  status: number;
  headers: Record<string, string>;
  text: string;
}

/**
 * HTTP status codes used by the dispatcher
 */
export const HttpStatus = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Create a JSON response
 */
export function jsonResponse(statusCode: number, body: JsonValue): JsonResponse {
  return {
    statusCode,
    body,
    headers: { 'Content-Type': JSON_CONTENT_TYPE },
  };
}

/**
 * Error body: {"error":{"code":...,"message":...}}
 */
export function apiError(code: string, message: string): JsonObject {
  return JsonObject.of({
    error: JsonObject.of({
      code: new JsonString(code),
      message: new JsonString(message),
    }),
  });
}

/**
 * Create the response for a framework error
 *
 * Server-side failures get a generic message; the details stay in the logs.
 */
export function errorResponse(error: FrameworkError): JsonResponse {
  const message = error.status >= 500 ? 'Internal Server Error' : error.message;
  return jsonResponse(error.status, apiError(error.code, message));
}

/**
 * Render a response with the compact JSON renderer
 */
export function renderResponse(response: JsonResponse): RenderedResponse {
  return {
    status: response.statusCode,
    headers: { ...response.headers },
    text: response.body.toJsonString(),
  };
}
