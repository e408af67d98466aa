/**
 * ExtraBoolean - Four-valued boolean with a truth weight
 */

import { Option } from 'effect';

export type ExtraBooleanName =
  | 'EXTRA_TRUE'
  | 'WEAK_TRUE'
  | 'WEAK_FALSE'
  | 'EXTRA_FALSE';

const TRUTH_THRESHOLD = 0.5;

export class ExtraBoolean {
  static readonly EXTRA_TRUE = new ExtraBoolean('EXTRA_TRUE', 1.0);
  static readonly WEAK_TRUE = new ExtraBoolean('WEAK_TRUE', 0.6);
  static readonly WEAK_FALSE = new ExtraBoolean('WEAK_FALSE', 0.3);
  static readonly EXTRA_FALSE = new ExtraBoolean('EXTRA_FALSE', 0.0);

  static values(): ReadonlyArray<ExtraBoolean> {
    return [
      ExtraBoolean.EXTRA_TRUE,
      ExtraBoolean.WEAK_TRUE,
      ExtraBoolean.WEAK_FALSE,
      ExtraBoolean.EXTRA_FALSE,
    ];
  }

  private constructor(
    readonly name: ExtraBooleanName,
    readonly weight: number
  ) {}

  toBoolean(): boolean {
    return this.weight >= TRUTH_THRESHOLD;
  }

  toInteger(): number {
    return this.toBoolean() ? 1 : 0;
  }

  toDouble(): number {
    return this.weight;
  }

  isAtLeastAsTrueAs(other: ExtraBoolean): boolean {
    return this.weight >= other.weight;
  }

  /** The less true of both. */
  and(other: ExtraBoolean): ExtraBoolean {
    return this.isAtLeastAsTrueAs(other) ? other : this;
  }

  /** The more true of both. */
  or(other: ExtraBoolean): ExtraBoolean {
    return this.isAtLeastAsTrueAs(other) ? this : other;
  }

  /**
   * Graded equality: identical values are EXTRA_TRUE, equal truthiness is
   * WEAK_TRUE, near weights are WEAK_FALSE, anything else EXTRA_FALSE.
   */
  equals(other: ExtraBoolean): ExtraBoolean {
    if (this === other) return ExtraBoolean.EXTRA_TRUE;
    if (this.toBoolean() === other.toBoolean()) return ExtraBoolean.WEAK_TRUE;
    if (Math.abs(this.weight - other.weight) < TRUTH_THRESHOLD) {
      return ExtraBoolean.WEAK_FALSE;
    }
    return ExtraBoolean.EXTRA_FALSE;
  }

  toString(): string {
    return this.name;
  }

  static fromBoolean(value: boolean): ExtraBoolean {
    return value ? ExtraBoolean.EXTRA_TRUE : ExtraBoolean.EXTRA_FALSE;
  }

  static fromDouble(value: number): ExtraBoolean {
    if (value >= 1.0) return ExtraBoolean.EXTRA_TRUE;
    if (value >= 0.6) return ExtraBoolean.WEAK_TRUE;
    if (value >= 0.3) return ExtraBoolean.WEAK_FALSE;
    return ExtraBoolean.EXTRA_FALSE;
  }

  static fromString(value: string): Option.Option<ExtraBoolean> {
    const normalized = value.trim().toUpperCase();
    if (normalized === 'TRUE') return Option.some(ExtraBoolean.EXTRA_TRUE);
    if (normalized === 'FALSE') return Option.some(ExtraBoolean.EXTRA_FALSE);
    return Option.fromNullable(
      ExtraBoolean.values().find((candidate) => candidate.name === normalized)
    );
  }
}
