/**
 * Value - Immutable pair of a raw payload and its data type
 *
 * Conversions go through the DataTypeRegistry service and always yield a
 * new Value. A null Value keeps its data type as a typed placeholder.
 */

import { Data, Effect } from 'effect';
import { ConversionError } from '../errors';
import { DataTypeRegistry } from '../services/data-types/service';
import { BasicDataType, type DataType } from './data-type';
import { ExtraBoolean } from './extra-boolean';

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const isNumber = (raw: unknown): raw is number => typeof raw === 'number';
const isInt32 = (raw: unknown): raw is number =>
  isNumber(raw) && Number.isInteger(raw) && raw >= INT_MIN && raw <= INT_MAX;
const isBigint = (raw: unknown): raw is bigint => typeof raw === 'bigint';
const isString = (raw: unknown): raw is string => typeof raw === 'string';
const isBoolean = (raw: unknown): raw is boolean => typeof raw === 'boolean';
const isNumeric = (raw: unknown): raw is number | bigint =>
  isNumber(raw) || isBigint(raw);
const isExtraBoolean = (raw: unknown): raw is ExtraBoolean =>
  raw instanceof ExtraBoolean;
const isDate = (raw: unknown): raw is Date => raw instanceof Date;

const narrowLong = (value: bigint | number): bigint => {
  if (isBigint(value)) {
    if (value > LONG_MAX) return LONG_MAX;
    return value < LONG_MIN ? LONG_MIN : value;
  }
  if (Number.isNaN(value)) return 0n;
  if (value >= 2 ** 63) return LONG_MAX;
  if (value <= -(2 ** 63)) return LONG_MIN;
  return BigInt(Math.trunc(value));
};

const utcMidnight = (date: Date): Date =>
  new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );

export class Value extends Data.Class<{
  readonly raw: unknown;
  readonly type: DataType;
}> {
  // ============= Factories =============

  static of(raw: unknown, type: DataType): Value {
    return new Value({ raw: raw ?? null, type });
  }

  static nullOf(type: DataType): Value {
    return new Value({ raw: null, type });
  }

  static string(value: string): Value {
    return Value.of(value, BasicDataType.STRING);
  }

  /**
   * Narrows like a 32-bit cast: truncates toward zero, saturates at the
   * range bounds and maps NaN to 0.
   */
  static integer(value: number): Value {
    const narrowed = Number.isNaN(value)
      ? 0
      : Math.trunc(Math.min(INT_MAX, Math.max(INT_MIN, value)));
    return Value.of(narrowed, BasicDataType.INTEGER);
  }

  static double(value: number): Value {
    return Value.of(value, BasicDataType.DOUBLE);
  }

  /** Narrows to the 64-bit range the same way as {@link Value.integer}. */
  static long(value: bigint | number): Value {
    return Value.of(narrowLong(value), BasicDataType.LONG);
  }

  static number(value: number | bigint): Value {
    return Value.of(value, BasicDataType.NUMBER);
  }

  static boolean(value: boolean): Value {
    return Value.of(value, BasicDataType.BOOLEAN);
  }

  static extraBoolean(value: ExtraBoolean): Value {
    return Value.of(value, BasicDataType.EXTRA_BOOLEAN);
  }

  /** Keeps the UTC calendar day only. */
  static date(value: Date): Value {
    return Value.of(utcMidnight(value), BasicDataType.DATE);
  }

  static dateTime(value: Date): Value {
    return Value.of(new Date(value.getTime()), BasicDataType.DATETIME);
  }

  /**
   * Same type and equal payloads; dates compare by instant.
   */
  static valuesAreEqual(a: Value, b: Value): boolean {
    if (a.type.name !== b.type.name) return false;
    if (isDate(a.raw) && isDate(b.raw)) {
      return a.raw.getTime() === b.raw.getTime();
    }
    return a.raw === b.raw;
  }

  // ============= Accessors =============

  getType(): DataType {
    return this.type;
  }

  getRawValue(): unknown {
    return this.raw;
  }

  isNull(): boolean {
    return this.raw === null;
  }

  toString(): string {
    return `${this.type.name}(${this.isNull() ? 'null' : String(this.raw)})`;
  }

  // ============= Conversions =============

  castTo(
    to: DataType
  ): Effect.Effect<Value, ConversionError, DataTypeRegistry> {
    return Effect.flatMap(DataTypeRegistry, (registry) =>
      registry.cast(this, to)
    );
  }

  toInteger() {
    return this.unwrap(BasicDataType.INTEGER, isInt32);
  }

  toDouble() {
    return this.unwrap(BasicDataType.DOUBLE, isNumber);
  }

  toLong() {
    return this.unwrap(BasicDataType.LONG, isBigint);
  }

  toNumber() {
    return this.unwrap(BasicDataType.NUMBER, isNumeric);
  }

  toBoolean() {
    return this.unwrap(BasicDataType.BOOLEAN, isBoolean);
  }

  toExtraBoolean() {
    return this.unwrap(BasicDataType.EXTRA_BOOLEAN, isExtraBoolean);
  }

  toStringValue() {
    return this.unwrap(BasicDataType.STRING, isString);
  }

  toDate() {
    return this.unwrap(BasicDataType.DATE, isDate);
  }

  toDateTime() {
    return this.unwrap(BasicDataType.DATETIME, isDate);
  }

  private unwrap<A>(
    to: DataType,
    guard: (raw: unknown) => raw is A
  ): Effect.Effect<A, ConversionError, DataTypeRegistry> {
    return Effect.flatMap(this.castTo(to), (cast) =>
      guard(cast.raw)
        ? Effect.succeed(cast.raw)
        : Effect.fail(
            new ConversionError({
              message: cast.isNull()
                ? `Can't unwrap a null ${this.type.name} as ${to.name}`
                : `Converted payload is not a ${to.name}`,
              value: this.raw,
              from: this.type.name,
              to: to.name,
            })
          )
    );
  }
}
