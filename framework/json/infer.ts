/**
 * JSON Inference
 *
 * Converts arbitrary runtime values into a JSON tree. Rules are tried in
 * a fixed order and the first match wins:
 *
 * 1. null / undefined        -> null
 * 2. boolean                 -> boolean
 * 3. number / bigint         -> number
 * 4. string                  -> string
 * 5. enum case               -> string (case name)
 * 6. JsonValue               -> itself
 * 7. Map / plain object      -> object
 * 8. array / Set / iterable  -> array
 * 9. JsonDescribable record  -> object (described fields, in order)
 *
 * Anything else throws `UnsupportedTypeError`. Cycles are not detected.
 */

import { UnsupportedTypeError } from '../errors/errors.ts';
import {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue,
} from './value.ts';

/**
 * Capability of a structured record to list its fields by name
 */
export interface JsonDescribable {
  describeJson(): Iterable<readonly [string, unknown]>;
}

/**
 * Base class for enumerations with fixed case names
 *
 * @example
 * class EvalType extends EnumCase {
 *   static readonly TEST = new EvalType('TEST');
 *   static readonly EXAM = new EvalType('EXAM');
 * }
 * inferJson(EvalType.TEST); // "TEST"
 */
export abstract class EnumCase {
  protected constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

export function isJsonDescribable(value: unknown): value is JsonDescribable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'describeJson' in value &&
    typeof value.describeJson === 'function'
  );
}

/**
 * Convert a runtime value to a JSON tree
 */
export function inferJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return JsonNull.instance;
  if (typeof value === 'boolean') return JsonBoolean.of(value);
  if (typeof value === 'number' || typeof value === 'bigint') return new JsonNumber(value);
  if (typeof value === 'string') return new JsonString(value);
  if (value instanceof EnumCase) return new JsonString(value.name);
  if (value instanceof JsonValue) return value;

  if (value instanceof Map) {
    return JsonObject.fromEntries(
      Array.from(
        value,
        ([key, item]: [unknown, unknown]) => [stringifyKey(key), inferJson(item)] as const
      )
    );
  }
  if (isPlainObject(value)) {
    return JsonObject.fromEntries(
      Object.entries(value).map(([key, item]) => [key, inferJson(item)] as const)
    );
  }

  if (isIterable(value)) {
    return new JsonArray(Array.from(value, (item: unknown) => inferJson(item)));
  }

  if (isJsonDescribable(value)) {
    return JsonObject.fromEntries(
      Array.from(value.describeJson(), ([field, item]) => [field, inferJson(item)] as const)
    );
  }

  throw new UnsupportedTypeError(typeName(value));
}

function stringifyKey(key: unknown): string {
  if (typeof key === 'string') return key;
  if (typeof key === 'number' || typeof key === 'bigint' || typeof key === 'boolean') {
    return String(key);
  }
  if (key instanceof EnumCase) return key.name;
  throw new UnsupportedTypeError(`${typeName(key)} (map key)`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function typeName(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'object';
  }
  return typeof value;
}
