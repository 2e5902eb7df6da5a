/**
 * Parameter Binding
 *
 * Declares where handler arguments come from and turns request text into
 * typed values.
 */

export {
  pathParam,
  queryParam,
  type ParamBinding,
  type ParamType,
  type ParamSource,
  type ParamValueMap,
  type BoundValue,
} from './params.ts';
export { coerceParam } from './coerce.ts';
export { parseQueryString } from './query.ts';
export { bindArguments, type BindingContext, type BindResult } from './binder.ts';
