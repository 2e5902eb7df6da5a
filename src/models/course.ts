/**
 * Course Model
 *
 * Example records served by the bundled routes.
 */

import { EnumCase, type JsonDescribable } from '../../framework/mod.ts';

export class EvalType extends EnumCase {
  static readonly TEST = new EvalType('TEST');
  static readonly PROJECT = new EvalType('PROJECT');
  static readonly EXAM = new EvalType('EXAM');
}

export class EvalItem implements JsonDescribable {
  constructor(
    readonly name: string,
    /** Weight in the final grade, 0..1 */
    readonly percentage: number,
    readonly mandatory: boolean,
    readonly type: EvalType | null
  ) {}

  describeJson(): Iterable<readonly [string, unknown]> {
    return [
      ['name', this.name],
      ['percentage', this.percentage],
      ['mandatory', this.mandatory],
      ['type', this.type],
    ];
  }
}

export class Course implements JsonDescribable {
  constructor(
    readonly id: number,
    readonly name: string,
    readonly credits: number,
    readonly evaluation: readonly EvalItem[]
  ) {}

  /**
   * Sum of evaluation weights
   */
  get totalWeight(): number {
    return this.evaluation.reduce((sum, item) => sum + item.percentage, 0);
  }

  describeJson(): Iterable<readonly [string, unknown]> {
    return [
      ['id', this.id],
      ['name', this.name],
      ['credits', this.credits],
      ['evaluation', this.evaluation],
    ];
  }
}
