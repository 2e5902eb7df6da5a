/**
 * Path Template Utilities
 *
 * Templates are `/`-joined segments where a segment is either a literal or
 * a placeholder written as a parenthesized name, e.g. `user/(id)`.
 */

export type PatternParams = Record<string, string>;

/**
 * Collapse repeated slashes
 */
export function normalizePath(path: string): string {
  return path.replace(/\/+/g, '/');
}

export function stripLeadingSlash(path: string): string {
  return path.startsWith('/') ? path.slice(1) : path;
}

/**
 * Join a base path and a handler's relative path into a template
 * e.g., ('test', '/user/(id)') -> 'test/user/(id)'
 *
 * A relative path of exactly '/' maps to the base path itself.
 */
export function joinTemplate(basePath: string, relativePath: string): string {
  if (relativePath === '/') {
    return normalizePath(basePath);
  }
  return normalizePath(`${basePath}/${stripLeadingSlash(relativePath)}`);
}

export function splitSegments(path: string): string[] {
  return path.split('/');
}

/**
 * Check whether a template segment is a placeholder
 */
export function isPlaceholder(segment: string): boolean {
  return segment.startsWith('(') && segment.endsWith(')');
}

/**
 * Name inside a placeholder, e.g. '(id)' -> 'id'
 */
export function placeholderName(segment: string): string | null {
  return isPlaceholder(segment) ? segment.slice(1, -1) : null;
}

/**
 * Match a request path against a template
 *
 * Returns the request's segments on success so callers can read bound
 * values by index, or null when the path does not fit the template.
 */
export function matchTemplate(template: string, path: string): string[] | null {
  const templateParts = splitSegments(template);
  const pathParts = splitSegments(stripLeadingSlash(path));

  if (templateParts.length !== pathParts.length) return null;

  for (let i = 0; i < templateParts.length; i++) {
    const expected = templateParts[i];
    const actual = pathParts[i];
    if (expected === actual) continue;
    if (isPlaceholder(expected) && actual !== '') continue;
    return null;
  }

  return pathParts;
}

/**
 * Check whether two templates can match the same concrete path
 */
export function templatesOverlap(a: string, b: string): boolean {
  const left = splitSegments(a);
  const right = splitSegments(b);
  if (left.length !== right.length) return false;

  return left.every((segment, i) => {
    const other = right[i];
    return segment === other || isPlaceholder(segment) || isPlaceholder(other);
  });
}

/**
 * Parse placeholder names from a template, in order
 */
export function parsePathParams(template: string): string[] {
  const params: string[] = [];

  for (const segment of splitSegments(template)) {
    const name = placeholderName(segment);
    if (name !== null) {
      params.push(name);
    }
  }

  return params;
}

/**
 * Build a concrete path from a template and parameters
 */
export function buildPath(
  template: string,
  params: PatternParams,
  query?: Record<string, string>
): string {
  const segments = splitSegments(template).map((segment) => {
    const name = placeholderName(segment);
    if (name === null) return segment;

    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing value for path parameter '${name}'`);
    }
    return encodeURIComponent(value);
  });

  let path = '/' + segments.join('/');

  if (query && Object.keys(query).length > 0) {
    const pairs = Object.entries(query).map(([key, value]) => `${key}=${value}`);
    path += '?' + pairs.join('&');
  }

  return path;
}
