/**
 * ValueParser - Converts raw payloads between data types
 */

import type { Effect } from 'effect';
import type { ConversionError } from '../errors';
import type { ConversionReliability } from './conversion-reliability';
import type { DataType } from './data-type';

/**
 * A direct conversion a parser can perform, with its reliability.
 */
export interface Conversion {
  readonly from: DataType;
  readonly to: DataType;
  readonly reliability: ConversionReliability;
}

export interface ValueParser {
  readonly name: string;
  readonly supportedInputTypes: ReadonlyArray<DataType>;
  readonly supportedOutputTypes: ReadonlyArray<DataType>;
  readonly conversions: ReadonlyArray<Conversion>;

  /**
   * Convert a non-null payload of type `from` into a payload of type `to`.
   */
  readonly parse: (
    raw: unknown,
    from: DataType,
    to: DataType
  ) => Effect.Effect<unknown, ConversionError>;
}

export const supportsInput = (parser: ValueParser, type: DataType): boolean =>
  parser.supportedInputTypes.some((candidate) => candidate.name === type.name);

export const supportsOutput = (parser: ValueParser, type: DataType): boolean =>
  parser.supportedOutputTypes.some((candidate) => candidate.name === type.name);
