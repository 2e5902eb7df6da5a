/**
 * JSON Layer
 *
 * In-memory JSON tree, inference from runtime values, and visitors.
 */

export {
  JsonValue,
  JsonObject,
  JsonArray,
  JsonString,
  JsonNumber,
  JsonBoolean,
  JsonNull,
  isJsonValue,
  quoteJsonString,
  type JsonKind,
  type JsonEntry,
} from './value.ts';
export type { JsonVisitor } from './visitor.ts';
export { inferJson, isJsonDescribable, EnumCase, type JsonDescribable } from './infer.ts';
export {
  JsonValidator,
  PrettyPrintVisitor,
  DebugVisitor,
  ArrayTypeChecker,
  type ValidationIssue,
  type ValidationIssueKind,
  type ArrayElementKind,
} from './visitors/mod.ts';
