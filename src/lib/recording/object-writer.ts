/**
 * ObjectWriter - Stable per-writer ids for writables
 *
 * The first time a writable is met it gets an id, reusing the one it
 * carries when that id is still free; later lookups return the same id.
 * Ids are unique within one writer only. Not safe for concurrent use.
 */

import { isIdentified, type Writable } from './constructable';
import { IdGenerator } from './id-generator';

export interface ObjectWriterOptions {
  readonly idIndicator?: string;
  /** Keep the ids identified writables already carry. */
  readonly reuseIds?: boolean;
  readonly generator?: IdGenerator;
}

export class ObjectWriter {
  private readonly ids = new Map<Writable, string>();
  protected readonly idIndicator: string;
  private readonly reuseIds: boolean;
  private readonly generator: IdGenerator;

  constructor(options: ObjectWriterOptions = {}) {
    this.idIndicator = options.idIndicator ?? '#';
    this.reuseIds = options.reuseIds ?? true;
    this.generator = options.generator ?? new IdGenerator(this.idIndicator);
  }

  getIdFor(writable: Writable): string {
    const known = this.ids.get(writable);
    if (known !== undefined) return known;

    const id = this.ownIdOf(writable) ?? this.generator.generate();
    this.ids.set(writable, id);
    return id;
  }

  private ownIdOf(writable: Writable): string | undefined {
    if (!this.reuseIds || !isIdentified(writable)) return undefined;
    const id = writable.getId();
    if (
      id.length <= this.idIndicator.length ||
      !id.startsWith(this.idIndicator) ||
      this.generator.isReserved(id)
    ) {
      return undefined;
    }
    this.generator.reserve(id);
    return id;
  }
}
