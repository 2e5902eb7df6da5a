/**
 * Debug Visitor
 *
 * Records one line per visited node, in visit order.
 */

import type { JsonVisitor } from '../visitor.ts';
import type {
  JsonArray,
  JsonBoolean,
  JsonNumber,
  JsonObject,
  JsonString,
} from '../value.ts';

export class DebugVisitor implements JsonVisitor {
  private log: string[] = [];

  getLog(): string[] {
    return [...this.log];
  }

  visitObject(value: JsonObject): void {
    this.log.push(`Visit Object (keys: [${value.keys().join(', ')}])`);
    for (const [, child] of value.entries) {
      child.accept(this);
    }
  }

  visitArray(value: JsonArray): void {
    this.log.push(`Visit Array (size: ${value.length})`);
    for (const element of value.elements) {
      element.accept(this);
    }
  }

  visitString(value: JsonString): void {
    this.log.push(`Visit String: "${value.value}"`);
  }

  visitNumber(value: JsonNumber): void {
    this.log.push(`Visit Number: ${value.toJsonString()}`);
  }

  visitBoolean(value: JsonBoolean): void {
    this.log.push(`Visit Boolean: ${value.value}`);
  }

  visitNull(): void {
    this.log.push('Visit Null');
  }
}
