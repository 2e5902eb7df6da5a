/**
 * Pretty Printer
 *
 * Indented rendering for humans. Keys are printed in sorted order; the
 * tree itself is untouched, so compact output and equality are unaffected.
 */

import type { JsonVisitor } from '../visitor.ts';
import {
  quoteJsonString,
  type JsonArray,
  type JsonBoolean,
  type JsonNull,
  type JsonNumber,
  type JsonObject,
  type JsonString,
  type JsonValue,
} from '../value.ts';

export class PrettyPrintVisitor implements JsonVisitor<string> {
  private depth = 0;

  constructor(private readonly indent: string = '    ') {}

  /**
   * Render a value with the default four-space indent
   */
  static print(value: JsonValue, indent?: string): string {
    return value.accept(new PrettyPrintVisitor(indent));
  }

  visitObject(value: JsonObject): string {
    if (value.size === 0) return '{}';

    const entries = [...value.entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const lines = this.nested(() =>
      entries.map(([key, child]) => `${this.pad()}${quoteJsonString(key)}: ${child.accept(this)}`)
    );
    return `{\n${lines.join(',\n')}\n${this.pad()}}`;
  }

  visitArray(value: JsonArray): string {
    if (value.length === 0) return '[]';

    const lines = this.nested(() =>
      value.elements.map((element) => `${this.pad()}${element.accept(this)}`)
    );
    return `[\n${lines.join(',\n')}\n${this.pad()}]`;
  }

  visitString(value: JsonString): string {
    return value.toJsonString();
  }

  visitNumber(value: JsonNumber): string {
    return value.toJsonString();
  }

  visitBoolean(value: JsonBoolean): string {
    return value.toJsonString();
  }

  visitNull(value: JsonNull): string {
    return value.toJsonString();
  }

  private nested<T>(fn: () => T): T {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  private pad(): string {
    return this.indent.repeat(this.depth);
  }
}
