/**
 * Parameter Declarations
 *
 * Each handler argument is bound either from a path placeholder or from a
 * query key, and coerced to one of the supported primitive types.
 */

export type ParamType = 'int' | 'long' | 'float' | 'boolean' | 'string';

export type ParamSource = 'path' | 'query';

/**
 * Runtime value for each parameter type
 */
export interface ParamValueMap {
  int: number;
  long: bigint;
  float: number;
  boolean: boolean;
  string: string;
}

export type BoundValue = ParamValueMap[ParamType];

export interface ParamBinding<T extends ParamType = ParamType> {
  readonly source: ParamSource;
  /** Placeholder name for path params, query key for query params */
  readonly name: string;
  readonly type: T;
}

/**
 * Bind an argument to the path segment under placeholder `(name)`
 */
export function pathParam<T extends ParamType>(name: string, type: T): ParamBinding<T> {
  const binding: ParamBinding<T> = { source: 'path', name, type };
  return Object.freeze(binding);
}

/**
 * Bind an argument to a query string value
 */
export function queryParam<T extends ParamType>(name: string, type: T): ParamBinding<T> {
  const binding: ParamBinding<T> = { source: 'query', name, type };
  return Object.freeze(binding);
}
