/**
 * RecordedObject - Generic construct that is also writable
 *
 * Keeps attributes and links exactly as they were recorded, so reading
 * and writing it are inverse operations.
 */

import { Effect, Option } from 'effect';
import type {
  Constructable,
  ConstructableFactory,
  IdentifiedWritable,
} from './constructable';

export class RecordedObject
  implements Constructable<RecordedObject>, IdentifiedWritable
{
  private id = '';
  private readonly attributes = new Map<string, string>();
  private readonly links = new Map<string, RecordedObject>();

  constructor(readonly instruction: Option.Option<string> = Option.none()) {}

  static readonly factory: ConstructableFactory<RecordedObject> = (
    instruction
  ) => new RecordedObject(instruction);

  getId(): string {
    return this.id;
  }

  setId(id: string): void {
    this.id = id;
  }

  setAttribute(name: string, value: string): Effect.Effect<void> {
    return Effect.sync(() => {
      this.attributes.set(name, value);
    });
  }

  setLink(name: string, target: RecordedObject): Effect.Effect<void> {
    return Effect.sync(() => {
      this.links.set(name, target);
    });
  }

  getAttributes(): ReadonlyMap<string, string> {
    return this.attributes;
  }

  getLinks(): ReadonlyMap<string, RecordedObject> {
    return this.links;
  }

  getAttribute(name: string): Option.Option<string> {
    return Option.fromNullable(this.attributes.get(name));
  }

  getLink(name: string): Option.Option<RecordedObject> {
    return Option.fromNullable(this.links.get(name));
  }
}
