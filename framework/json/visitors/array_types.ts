/**
 * Array Type Checker
 *
 * Finds the element kind of every array in a tree. An array is uniform
 * when all of its elements share one kind and none of them is null;
 * anything else (including an empty array) is reported as `any`.
 */

import type { JsonVisitor } from '../visitor.ts';
import type { JsonArray, JsonKind, JsonObject } from '../value.ts';

export type ArrayElementKind = Exclude<JsonKind, 'null'> | 'any';

export class ArrayTypeChecker implements JsonVisitor {
  private arrayTypes = new Map<JsonArray, ArrayElementKind>();

  getArrayTypes(): Map<JsonArray, ArrayElementKind> {
    return new Map(this.arrayTypes);
  }

  /**
   * Element kind of one array, if it was visited
   */
  kindOf(array: JsonArray): ArrayElementKind | undefined {
    return this.arrayTypes.get(array);
  }

  visitObject(value: JsonObject): void {
    for (const [, child] of value.entries) {
      child.accept(this);
    }
  }

  visitArray(value: JsonArray): void {
    this.arrayTypes.set(value, elementKind(value));
    for (const element of value.elements) {
      element.accept(this);
    }
  }

  visitString(): void {}
  visitNumber(): void {}
  visitBoolean(): void {}
  visitNull(): void {}
}

function elementKind(array: JsonArray): ArrayElementKind {
  const kind = array.get(0)?.kind;
  if (kind === undefined || kind === 'null') return 'any';

  return array.elements.every((element) => element.kind === kind) ? kind : 'any';
}
