/**
 * JSON Structure Validator
 *
 * Walks a JSON tree and reports keys that cannot round-trip cleanly:
 * empty keys anywhere, and keys repeated among the entries of one object.
 * Only siblings are compared; the same key in two different objects is
 * fine. The value behind a repeated key is not descended into.
 */

import type { JsonVisitor } from '../visitor.ts';
import type { JsonArray, JsonObject, JsonValue } from '../value.ts';

export type ValidationIssueKind = 'empty-key' | 'duplicate-key';

export interface ValidationIssue {
  kind: ValidationIssueKind;
  /** Location of the object holding the key, e.g. `$.items[2]` */
  path: string;
  key: string;
  message: string;
}

export class JsonValidator implements JsonVisitor {
  private issues: ValidationIssue[] = [];
  private path: string[] = ['$'];

  /**
   * Validate a whole tree and return the issues found
   */
  static validate(value: JsonValue): ValidationIssue[] {
    const validator = new JsonValidator();
    value.accept(validator);
    return validator.getIssues();
  }

  isValid(): boolean {
    return this.issues.length === 0;
  }

  getIssues(): ValidationIssue[] {
    return [...this.issues];
  }

  getErrors(): string[] {
    return this.issues.map((issue) => issue.message);
  }

  visitObject(value: JsonObject): void {
    const seen = new Set<string>();
    const location = this.path.join('');

    for (const [key, child] of value.entries) {
      if (key === '') {
        this.report('empty-key', location, key, `Empty key found at ${location}`);
      }

      if (seen.has(key)) {
        this.report('duplicate-key', location, key, `Duplicate key '${key}' at ${location}`);
        continue;
      }
      seen.add(key);

      this.path.push(`.${key}`);
      child.accept(this);
      this.path.pop();
    }
  }

  visitArray(value: JsonArray): void {
    value.elements.forEach((element, index) => {
      this.path.push(`[${index}]`);
      element.accept(this);
      this.path.pop();
    });
  }

  visitString(): void {}
  visitNumber(): void {}
  visitBoolean(): void {}
  visitNull(): void {}

  private report(kind: ValidationIssueKind, path: string, key: string, message: string): void {
    this.issues.push({ kind, path, key, message });
  }
}
