/**
 * JSON Value Model
 *
 * Immutable JSON tree with exactly six variants. Every node renders itself
 * to compact JSON text and accepts a visitor.
 */

import type { JsonVisitor } from './visitor.ts';

export type JsonKind = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

export type JsonEntry = readonly [key: string, value: JsonValue];

/**
 * Base class of the closed JSON variant set
 */
export abstract class JsonValue {
  abstract readonly kind: JsonKind;

  /**
   * Dispatch to the visitor operation for this variant
   */
  abstract accept<R>(visitor: JsonVisitor<R>): R;

  /**
   * Compact JSON text
   */
  abstract toJsonString(): string;

  /**
   * Structural equality
   */
  abstract equals(other: JsonValue): boolean;

  toString(): string {
    return this.toJsonString();
  }
}

/**
 * Quote a string as a JSON string literal
 */
export function quoteJsonString(value: string): string {
  return JSON.stringify(value);
}

/**
 * JSON object
 *
 * The constructor keeps entries exactly as given, repeated keys included.
 * Use `fromEntries` or `of` to build an object where a later key replaces
 * an earlier one.
 */
export class JsonObject extends JsonValue {
  readonly kind = 'object' as const;
  readonly entries: ReadonlyArray<JsonEntry>;

  constructor(entries: Iterable<JsonEntry> = []) {
    super();
    this.entries = Object.freeze([...entries]);
  }

  /**
   * Build from key/value pairs, last duplicate wins
   */
  static fromEntries(entries: Iterable<readonly [string, JsonValue]>): JsonObject {
    const map = new Map<string, JsonValue>();
    for (const [key, value] of entries) {
      map.set(key, value);
    }
    return new JsonObject(map);
  }

  /**
   * Build from a record of JSON values
   */
  static of(properties: Readonly<Record<string, JsonValue>>): JsonObject {
    return JsonObject.fromEntries(Object.entries(properties));
  }

  get size(): number {
    return this.entries.length;
  }

  keys(): string[] {
    return this.entries.map(([key]) => key);
  }

  has(key: string): boolean {
    return this.entries.some(([k]) => k === key);
  }

  /**
   * Value for a key (the last one if the key repeats)
   */
  get(key: string): JsonValue | undefined {
    let found: JsonValue | undefined;
    for (const [k, value] of this.entries) {
      if (k === key) found = value;
    }
    return found;
  }

  /**
   * Keep only the entries matching the predicate
   */
  filter(predicate: (key: string, value: JsonValue) => boolean): JsonObject {
    return new JsonObject(this.entries.filter(([key, value]) => predicate(key, value)));
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitObject(this);
  }

  toJsonString(): string {
    const body = this.entries
      .map(([key, value]) => `${quoteJsonString(key)}:${value.toJsonString()}`)
      .join(',');
    return `{${body}}`;
  }

  equals(other: JsonValue): boolean {
    if (!(other instanceof JsonObject)) return false;

    const mine = this.toMap();
    const theirs = other.toMap();
    if (mine.size !== theirs.size) return false;

    for (const [key, value] of mine) {
      const match = theirs.get(key);
      if (!match || !value.equals(match)) return false;
    }
    return true;
  }

  private toMap(): Map<string, JsonValue> {
    return new Map(this.entries);
  }
}

/**
 * JSON array
 */
export class JsonArray extends JsonValue {
  readonly kind = 'array' as const;
  readonly elements: ReadonlyArray<JsonValue>;

  constructor(elements: Iterable<JsonValue> = []) {
    super();
    this.elements = Object.freeze([...elements]);
  }

  get length(): number {
    return this.elements.length;
  }

  get(index: number): JsonValue | undefined {
    return this.elements[index];
  }

  filter(predicate: (value: JsonValue, index: number) => boolean): JsonArray {
    return new JsonArray(this.elements.filter(predicate));
  }

  map(transform: (value: JsonValue, index: number) => JsonValue): JsonArray {
    return new JsonArray(this.elements.map(transform));
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitArray(this);
  }

  toJsonString(): string {
    return `[${this.elements.map((element) => element.toJsonString()).join(',')}]`;
  }

  equals(other: JsonValue): boolean {
    if (!(other instanceof JsonArray)) return false;
    if (other.elements.length !== this.elements.length) return false;
    return this.elements.every((element, i) => element.equals(other.elements[i]));
  }
}

export class JsonString extends JsonValue {
  readonly kind = 'string' as const;

  constructor(readonly value: string) {
    super();
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitString(this);
  }

  toJsonString(): string {
    return quoteJsonString(this.value);
  }

  equals(other: JsonValue): boolean {
    return other instanceof JsonString && other.value === this.value;
  }
}

/**
 * JSON number; bigint values keep their full precision
 */
export class JsonNumber extends JsonValue {
  readonly kind = 'number' as const;

  constructor(readonly value: number | bigint) {
    super();
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitNumber(this);
  }

  toJsonString(): string {
    return String(this.value);
  }

  // 42 and 42n are the same JSON number
  equals(other: JsonValue): boolean {
    return other instanceof JsonNumber && other.toJsonString() === this.toJsonString();
  }
}

export class JsonBoolean extends JsonValue {
  readonly kind = 'boolean' as const;

  static readonly TRUE = new JsonBoolean(true);
  static readonly FALSE = new JsonBoolean(false);

  constructor(readonly value: boolean) {
    super();
  }

  static of(value: boolean): JsonBoolean {
    return value ? JsonBoolean.TRUE : JsonBoolean.FALSE;
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitBoolean(this);
  }

  toJsonString(): string {
    return this.value ? 'true' : 'false';
  }

  equals(other: JsonValue): boolean {
    return other instanceof JsonBoolean && other.value === this.value;
  }
}

/**
 * JSON null, a singleton
 */
export class JsonNull extends JsonValue {
  readonly kind = 'null' as const;

  static readonly instance = new JsonNull();

  private constructor() {
    super();
  }

  accept<R>(visitor: JsonVisitor<R>): R {
    return visitor.visitNull(this);
  }

  toJsonString(): string {
    return 'null';
  }

  equals(other: JsonValue): boolean {
    return other instanceof JsonNull;
  }
}

/**
 * Type guard for any JSON tree node
 */
export function isJsonValue(value: unknown): value is JsonValue {
  return value instanceof JsonValue;
}
