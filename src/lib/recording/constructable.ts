/**
 * Constructable / Writable - The two views of a recorded object
 *
 * A Constructable is filled in by the builder from an instruction stream;
 * a Writable exposes the same attributes and links to an object writer.
 */

import type { Effect, Option } from 'effect';

export interface Constructable<Self, E = never> {
  getId(): string;
  setId(id: string): void;
  setAttribute(name: string, value: string): Effect.Effect<void, E>;
  setLink(name: string, target: Self): Effect.Effect<void, E>;
}

export interface Writable {
  getAttributes(): ReadonlyMap<string, string>;
  getLinks(): ReadonlyMap<string, Writable>;
}

/**
 * A writable that already carries an id, which writers may reuse.
 */
export interface IdentifiedWritable extends Writable {
  getId(): string;
}

export const isIdentified = (
  writable: Writable
): writable is IdentifiedWritable =>
  'getId' in writable && typeof writable.getId === 'function';

/**
 * Creates a construct for the instruction context in effect at `create`.
 */
export type ConstructableFactory<T> = (instruction: Option.Option<string>) => T;
