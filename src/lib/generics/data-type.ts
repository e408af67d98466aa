/**
 * Data types - Named type tags for values
 *
 * Types are compared by name. The basic set covers the payloads the
 * basic parser understands; callers may register further types.
 */

import { Data } from 'effect';

export interface DataType {
  readonly name: string;
}

export const makeDataType = (name: string): DataType => Data.struct({ name });

export const BasicDataType = {
  STRING: makeDataType('STRING'),
  NUMBER: makeDataType('NUMBER'),
  LONG: makeDataType('LONG'),
  INTEGER: makeDataType('INTEGER'),
  DOUBLE: makeDataType('DOUBLE'),
  BOOLEAN: makeDataType('BOOLEAN'),
  EXTRA_BOOLEAN: makeDataType('EXTRA_BOOLEAN'),
  DATE: makeDataType('DATE'),
  DATETIME: makeDataType('DATETIME'),
} as const;

export type BasicDataTypeName = keyof typeof BasicDataType;

export const basicDataTypes: ReadonlyArray<DataType> =
  Object.values(BasicDataType);

export const sameType = (a: DataType, b: DataType): boolean =>
  a.name === b.name;
