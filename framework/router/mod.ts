/**
 * Routing Layer
 *
 * Maps request paths to registered handlers.
 *
 * Responsibilities:
 * - Build the route table once at startup
 * - Match paths against `(placeholder)` templates
 * - Generate paths for named routes
 */

export {
  Router,
  RouteTable,
  type RouteDefinition,
  type RouteMatch,
  type RouteHandler,
  type RouteOptions,
  type RouterOptions,
} from './router.ts';
export { RouteGroup } from './group.ts';
export {
  normalizePath,
  stripLeadingSlash,
  joinTemplate,
  splitSegments,
  isPlaceholder,
  placeholderName,
  matchTemplate,
  templatesOverlap,
  parsePathParams,
  buildPath,
  type PatternParams,
} from './patterns.ts';
