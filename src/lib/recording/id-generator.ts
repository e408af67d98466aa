/**
 * IdGenerator - Random object identifiers for recordings
 *
 * Ids are the id indicator followed by the base-36 encoding of a random
 * 63-bit magnitude. A generator never returns the same id twice, nor one
 * that was reserved on it.
 */

import { randomBytes } from 'crypto';

export const ID_INDICATOR = '#';

const MAGNITUDE_MASK = (1n << 63n) - 1n;

/**
 * Source of 63-bit random magnitudes; injectable for tests.
 */
export type RandomSource = () => bigint;

export const secureRandom: RandomSource = () =>
  randomBytes(8).readBigUInt64BE() & MAGNITUDE_MASK;

export class IdGenerator {
  private readonly used = new Set<string>();

  constructor(
    private readonly indicator: string = ID_INDICATOR,
    private readonly random: RandomSource = secureRandom
  ) {}

  generate(): string {
    for (;;) {
      const id = this.indicator + this.random().toString(36);
      if (!this.used.has(id)) {
        this.used.add(id);
        return id;
      }
    }
  }

  reserve(id: string): void {
    this.used.add(id);
  }

  isReserved(id: string): boolean {
    return this.used.has(id);
  }

  get size(): number {
    return this.used.size;
  }
}
