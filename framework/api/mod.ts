/**
 * API Layer
 *
 * Turns a request into a JSON response through the route table.
 */

export { Dispatcher, type DispatcherOptions } from './dispatcher.ts';
export {
  jsonResponse,
  apiError,
  errorResponse,
  renderResponse,
  HttpStatus,
  JSON_CONTENT_TYPE,
  type DispatchRequest,
  type JsonResponse,
  type RenderedResponse,
} from './response.ts';
