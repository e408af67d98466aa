/**
 * DataTypeRegistry - Service interface
 *
 * Owns the forest of data types and the ordered parser chain. One registry
 * is shared per program through the layer that provides it.
 */

import { Context, type Effect, type Option } from 'effect';
import type {
  ConversionError,
  DataTypeNotRegisteredError,
  HierarchyError,
} from '../../errors';
import type { ConversionReliability } from '../../generics/conversion-reliability';
import type { DataType } from '../../generics/data-type';
import type { Value } from '../../generics/value';
import type { ValueParser } from '../../generics/value-parser';

export interface DataTypeRegistry {
  /**
   * Insert or replace a type node. Replacing a node detaches the children
   * of the old node; the caller re-registers them where needed.
   */
  readonly register: (
    type: DataType,
    parent?: DataType
  ) => Effect.Effect<void, DataTypeNotRegisteredError | HierarchyError>;

  readonly contains: (type: DataType) => Effect.Effect<boolean>;

  readonly parentOf: (
    type: DataType
  ) => Effect.Effect<Option.Option<DataType>, DataTypeNotRegisteredError>;

  /**
   * True when `type` is `ancestor` or has it on its parent chain.
   */
  readonly isOfType: (
    type: DataType,
    ancestor: DataType
  ) => Effect.Effect<boolean, DataTypeNotRegisteredError>;

  /**
   * Add a parser at the front (primary) or the back of the chain.
   * A parser already in the chain is left where it is.
   */
  readonly addParser: (
    parser: ValueParser,
    isPrimary?: boolean
  ) => Effect.Effect<void>;

  readonly parsers: () => Effect.Effect<ReadonlyArray<ValueParser>>;

  readonly supportedInputTypes: () => Effect.Effect<ReadonlyArray<DataType>>;

  readonly supportedOutputTypes: () => Effect.Effect<ReadonlyArray<DataType>>;

  /**
   * Convert a raw payload with the first parser that supports both types.
   */
  readonly convert: (
    raw: unknown,
    from: DataType,
    to: DataType
  ) => Effect.Effect<Value, ConversionError>;

  readonly cast: (
    value: Value,
    to: DataType
  ) => Effect.Effect<Value, ConversionError>;

  /**
   * Reliability of the cheapest declared route from `from` to `to`,
   * regardless of whether a conversion is ever attempted.
   */
  readonly conversionReliability: (
    from: DataType,
    to: DataType
  ) => Effect.Effect<Option.Option<ConversionReliability>>;

  readonly findOptimalTargetType: (
    from: DataType,
    candidates: ReadonlyArray<DataType>
  ) => Effect.Effect<Option.Option<DataType>>;
}

export const DataTypeRegistry = Context.GenericTag<DataTypeRegistry>(
  '@services/DataTypeRegistry'
);
