/**
 * JSON Visitor Protocol
 *
 * One operation per JSON variant. A value's `accept` picks the operation,
 * so callers never switch on the runtime variant themselves. Visitors that
 * want to walk a tree call `accept` on the children they care about;
 * objects hand out entries in insertion order and arrays in index order.
 */

import type {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
} from './value.ts';

export interface JsonVisitor<R = void> {
  visitObject(value: JsonObject): R;
  visitArray(value: JsonArray): R;
  visitString(value: JsonString): R;
  visitNumber(value: JsonNumber): R;
  visitBoolean(value: JsonBoolean): R;
  visitNull(value: JsonNull): R;
}
