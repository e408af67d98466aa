/**
 * BasicValueParser - Conversions between the basic data types
 *
 * Payload shapes: STRING string, INTEGER 32-bit integral number,
 * DOUBLE number, LONG bigint, NUMBER number or bigint, BOOLEAN boolean,
 * EXTRA_BOOLEAN ExtraBoolean, DATE and DATETIME a UTC Date.
 *
 * Strings convert to numbers only when the whole trimmed string is a
 * literal. Under the lenient policy an integral target also accepts a
 * decimal literal and truncates it toward zero; the strict policy
 * requires an integer literal.
 */

import { Effect, Option } from 'effect';
import { conversionError } from '../errors';
import type { NumericStringPolicy } from '../services/config';
import { ConversionReliability } from './conversion-reliability';
import { BasicDataType, basicDataTypes, type DataType } from './data-type';
import { ExtraBoolean } from './extra-boolean';
import type { Conversion, ValueParser } from './value-parser';

// ============= Payloads =============

type Payload =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'bigint'; readonly value: bigint }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'extra'; readonly value: ExtraBoolean }
  | { readonly kind: 'date'; readonly value: Date };

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const some = (payload: Payload): Option.Option<Payload> =>
  Option.some(payload);

const isValidDate = (raw: unknown): raw is Date =>
  raw instanceof Date && !Number.isNaN(raw.getTime());

/**
 * Check a raw payload against the shape its declared type requires.
 */
const readPayload = (raw: unknown, from: DataType): Option.Option<Payload> => {
  switch (from.name) {
    case 'STRING':
      return typeof raw === 'string'
        ? some({ kind: 'string', value: raw })
        : Option.none();
    case 'INTEGER':
      return typeof raw === 'number' &&
        Number.isInteger(raw) &&
        raw >= INT_MIN &&
        raw <= INT_MAX
        ? some({ kind: 'number', value: raw })
        : Option.none();
    case 'DOUBLE':
      return typeof raw === 'number'
        ? some({ kind: 'number', value: raw })
        : Option.none();
    case 'LONG':
      return typeof raw === 'bigint' && raw >= LONG_MIN && raw <= LONG_MAX
        ? some({ kind: 'bigint', value: raw })
        : Option.none();
    case 'NUMBER':
      if (typeof raw === 'number') return some({ kind: 'number', value: raw });
      if (typeof raw === 'bigint') {
        return some({ kind: 'bigint', value: raw });
      }
      return Option.none();
    case 'BOOLEAN':
      return typeof raw === 'boolean'
        ? some({ kind: 'boolean', value: raw })
        : Option.none();
    case 'EXTRA_BOOLEAN':
      return raw instanceof ExtraBoolean
        ? some({ kind: 'extra', value: raw })
        : Option.none();
    case 'DATE':
    case 'DATETIME':
      return isValidDate(raw)
        ? some({ kind: 'date', value: raw })
        : Option.none();
    default:
      return Option.none();
  }
};

// ============= Literals =============

const INTEGER_LITERAL = /^[+-]?\d+$/;
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_LITERAL = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_LITERAL =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;

const parseDecimal = (text: string): number | undefined => {
  const trimmed = text.trim();
  return DECIMAL_LITERAL.test(trimmed) ? Number(trimmed) : undefined;
};

const utcDate = (
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0
): Date | undefined => {
  const date = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds, millis)
  );
  const consistent =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hours &&
    date.getUTCMinutes() === minutes &&
    date.getUTCSeconds() === seconds;
  return consistent ? date : undefined;
};

const parseDateText = (text: string): Date | undefined => {
  const match = DATE_LITERAL.exec(text.trim());
  if (!match) return undefined;
  return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
};

const parseDateTimeText = (text: string): Date | undefined => {
  const match = DATETIME_LITERAL.exec(text.trim());
  if (!match) return undefined;
  const millis = match[7] === undefined ? 0 : Number(match[7].padEnd(3, '0'));
  return utcDate(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4] ?? 0),
    Number(match[5] ?? 0),
    Number(match[6] ?? 0),
    millis
  );
};

export const formatDate = (date: Date): string =>
  date.toISOString().slice(0, 10);

export const formatDateTime = (date: Date): string =>
  date.toISOString().slice(0, date.getUTCMilliseconds() === 0 ? 19 : 23);

const startOfDay = (date: Date): Date =>
  new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );

// ============= Target Conversions =============

const asString = (payload: Payload, from: DataType): string => {
  switch (payload.kind) {
    case 'string':
      return payload.value;
    case 'number':
      return String(payload.value);
    case 'bigint':
      return payload.value.toString();
    case 'boolean':
      return payload.value ? 'true' : 'false';
    case 'extra':
      return payload.value.name;
    case 'date':
      return from.name === 'DATE'
        ? formatDate(payload.value)
        : formatDateTime(payload.value);
  }
};

const asDouble = (payload: Payload): number | undefined => {
  switch (payload.kind) {
    case 'string':
      return parseDecimal(payload.value);
    case 'number':
      return payload.value;
    case 'bigint':
      return Number(payload.value);
    case 'boolean':
      return payload.value ? 1 : 0;
    case 'extra':
      return payload.value.toDouble();
    case 'date':
      return undefined;
  }
};

const asLong = (
  payload: Payload,
  policy: NumericStringPolicy
): bigint | undefined => {
  switch (payload.kind) {
    case 'string': {
      const trimmed = payload.value.trim();
      if (INTEGER_LITERAL.test(trimmed)) return BigInt(trimmed);
      if (policy === 'strict') return undefined;
      const decimal = parseDecimal(trimmed);
      return decimal !== undefined && Number.isFinite(decimal)
        ? BigInt(Math.trunc(decimal))
        : undefined;
    }
    case 'number':
      return Number.isFinite(payload.value)
        ? BigInt(Math.trunc(payload.value))
        : undefined;
    case 'bigint':
      return payload.value;
    case 'boolean':
      return payload.value ? 1n : 0n;
    case 'extra':
      return BigInt(payload.value.toInteger());
    case 'date':
      return undefined;
  }
};

const asInteger = (
  payload: Payload,
  policy: NumericStringPolicy
): number | undefined => {
  const long = asLong(payload, policy);
  if (long === undefined) return undefined;
  return long >= BigInt(INT_MIN) && long <= BigInt(INT_MAX)
    ? Number(long)
    : undefined;
};

const asNumber = (
  payload: Payload,
  policy: NumericStringPolicy
): number | bigint | undefined => {
  switch (payload.kind) {
    case 'number':
    case 'bigint':
      return payload.value;
    case 'string': {
      const trimmed = payload.value.trim();
      if (INTEGER_LITERAL.test(trimmed)) {
        const value = Number(trimmed);
        return Number.isSafeInteger(value) ? value : asLong(payload, policy);
      }
      return parseDecimal(trimmed);
    }
    default:
      return asDouble(payload);
  }
};

const asBoolean = (payload: Payload): boolean | undefined => {
  switch (payload.kind) {
    case 'string':
      return Option.match(ExtraBoolean.fromString(payload.value), {
        onNone: () => undefined,
        onSome: (extra) => extra.toBoolean(),
      });
    case 'number':
      return !Number.isNaN(payload.value) && Math.trunc(payload.value) !== 0;
    case 'bigint':
      return payload.value !== 0n;
    case 'boolean':
      return payload.value;
    case 'extra':
      return payload.value.toBoolean();
    case 'date':
      return undefined;
  }
};

const asExtraBoolean = (payload: Payload): ExtraBoolean | undefined => {
  switch (payload.kind) {
    case 'string':
      return Option.getOrUndefined(ExtraBoolean.fromString(payload.value));
    case 'number':
      return ExtraBoolean.fromDouble(payload.value);
    case 'bigint':
      return ExtraBoolean.fromDouble(Number(payload.value));
    case 'boolean':
      return ExtraBoolean.fromBoolean(payload.value);
    case 'extra':
      return payload.value;
    case 'date':
      return undefined;
  }
};

const asDate = (payload: Payload): Date | undefined => {
  switch (payload.kind) {
    case 'string':
      return parseDateText(payload.value);
    case 'date':
      return startOfDay(payload.value);
    default:
      return undefined;
  }
};

const asDateTime = (payload: Payload): Date | undefined => {
  switch (payload.kind) {
    case 'string':
      return parseDateTimeText(payload.value);
    case 'date':
      return new Date(payload.value.getTime());
    default:
      return undefined;
  }
};

// ============= Declared Conversions =============

const conversion = (
  from: DataType,
  to: DataType,
  reliability: ConversionReliability
): Conversion => ({ from, to, reliability });

const { PERFECT, RELIABLE, UNRELIABLE } = ConversionReliability;
const T = BasicDataType;

export const basicConversions: ReadonlyArray<Conversion> = [
  ...basicDataTypes
    .filter((type) => type.name !== T.STRING.name)
    .map((type) => conversion(type, T.STRING, RELIABLE)),

  conversion(T.INTEGER, T.NUMBER, PERFECT),
  conversion(T.DOUBLE, T.NUMBER, PERFECT),
  conversion(T.LONG, T.NUMBER, PERFECT),

  conversion(T.NUMBER, T.INTEGER, RELIABLE),
  conversion(T.BOOLEAN, T.INTEGER, RELIABLE),
  conversion(T.EXTRA_BOOLEAN, T.INTEGER, RELIABLE),

  conversion(T.NUMBER, T.LONG, RELIABLE),
  conversion(T.BOOLEAN, T.LONG, RELIABLE),
  conversion(T.EXTRA_BOOLEAN, T.LONG, RELIABLE),

  conversion(T.NUMBER, T.DOUBLE, RELIABLE),
  conversion(T.BOOLEAN, T.DOUBLE, RELIABLE),
  conversion(T.EXTRA_BOOLEAN, T.DOUBLE, PERFECT),
  conversion(T.STRING, T.DOUBLE, UNRELIABLE),

  conversion(T.NUMBER, T.BOOLEAN, RELIABLE),
  conversion(T.EXTRA_BOOLEAN, T.BOOLEAN, RELIABLE),

  conversion(T.BOOLEAN, T.EXTRA_BOOLEAN, PERFECT),
  conversion(T.DOUBLE, T.EXTRA_BOOLEAN, RELIABLE),
  conversion(T.STRING, T.EXTRA_BOOLEAN, UNRELIABLE),

  conversion(T.DATETIME, T.DATE, RELIABLE),
  conversion(T.STRING, T.DATE, UNRELIABLE),
  conversion(T.DATE, T.DATETIME, PERFECT),
  conversion(T.STRING, T.DATETIME, UNRELIABLE),
];

// ============= Parser =============

export interface BasicValueParserOptions {
  readonly numericStrings: NumericStringPolicy;
}

const convertPayload = (
  payload: Payload,
  from: DataType,
  to: DataType,
  policy: NumericStringPolicy
): unknown => {
  switch (to.name) {
    case 'STRING':
      return asString(payload, from);
    case 'INTEGER':
      return asInteger(payload, policy);
    case 'LONG': {
      const long = asLong(payload, policy);
      return long !== undefined && long >= LONG_MIN && long <= LONG_MAX
        ? long
        : undefined;
    }
    case 'DOUBLE':
      return asDouble(payload);
    case 'NUMBER':
      return asNumber(payload, policy);
    case 'BOOLEAN':
      return asBoolean(payload);
    case 'EXTRA_BOOLEAN':
      return asExtraBoolean(payload);
    case 'DATE':
      return asDate(payload);
    case 'DATETIME':
      return asDateTime(payload);
    default:
      return undefined;
  }
};

export const makeBasicValueParser = (
  options: BasicValueParserOptions = { numericStrings: 'lenient' }
): ValueParser => ({
  name: 'basic',
  supportedInputTypes: basicDataTypes,
  supportedOutputTypes: basicDataTypes,
  conversions: basicConversions,
  parse: (raw, from, to) =>
    Option.match(readPayload(raw, from), {
      onNone: () =>
        Effect.fail(
          conversionError(
            raw,
            from.name,
            to.name,
            `payload does not have the shape of ${from.name}`
          )
        ),
      onSome: (payload) => {
        const converted = convertPayload(
          payload,
          from,
          to,
          options.numericStrings
        );
        return converted === undefined
          ? Effect.fail(conversionError(raw, from.name, to.name))
          : Effect.succeed(converted);
      },
    }),
});
