/**
 * Parameter Binder
 *
 * Resolves a handler's declared arguments against a matched request.
 * Arguments are bound left to right and the first failure wins; there
 * are no partial results.
 */

import {
  BindingError,
  MissingPathParameterError,
  MissingQueryParameterError,
} from '../errors/errors.ts';
import { splitSegments } from '../router/patterns.ts';
import { coerceParam } from './coerce.ts';
import type { BoundValue, ParamBinding } from './params.ts';

export interface BindingContext {
  /** Template of the matched route, e.g. 'test/user/(id)' */
  template: string;
  /** Request path segments aligned with the template's segments */
  segments: readonly string[];
  query: ReadonlyMap<string, string>;
}

export type BindResult =
  | { success: true; args: BoundValue[] }
  | { success: false; error: BindingError };

/**
 * Bind every declared argument, stopping at the first failure
 */
export function bindArguments(
  bindings: readonly ParamBinding[],
  context: BindingContext
): BindResult {
  const args: BoundValue[] = [];

  for (const binding of bindings) {
    try {
      args.push(coerceParam(binding.name, binding.type, resolveRaw(binding, context)));
    } catch (error) {
      if (error instanceof BindingError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  return { success: true, args };
}

/**
 * Raw text for one binding, before coercion
 */
function resolveRaw(binding: ParamBinding, context: BindingContext): string {
  if (binding.source === 'path') {
    const index = splitSegments(context.template).indexOf(`(${binding.name})`);
    const value = index === -1 ? undefined : context.segments[index];
    if (value === undefined) {
      throw new MissingPathParameterError(binding.name);
    }
    return value;
  }

  const value = context.query.get(binding.name);
  if (value === undefined) {
    throw new MissingQueryParameterError(binding.name);
  }
  return value;
}
