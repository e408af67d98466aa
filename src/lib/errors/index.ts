/**
 * Error hierarchy for flow recording using Effect's Data.TaggedError.
 * Every expected failure travels on the Effect error channel.
 */

import { Data } from 'effect';

// Configuration errors
export class ConfigError extends Data.TaggedError('ConfigError')<{
  readonly message: string;
  readonly key?: string;
  readonly cause?: unknown;
}> {}

// ============= Builder Errors =============

export class DuplicateIdError extends Data.TaggedError('DuplicateIdError')<{
  readonly message: string;
  readonly id: string;
}> {}

export class NoConstructError extends Data.TaggedError('NoConstructError')<{
  readonly message: string;
  readonly operation: 'addAttribute' | 'addLink';
}> {}

export class ConstructNotFoundError extends Data.TaggedError(
  'ConstructNotFoundError'
)<{
  readonly message: string;
  readonly id: string;
}> {}

export class DanglingLinkError extends Data.TaggedError('DanglingLinkError')<{
  readonly message: string;
  readonly ids: ReadonlyArray<string>;
}> {}

// ============= Format Errors =============

export class FormatError extends Data.TaggedError('FormatError')<{
  readonly message: string;
  readonly format: 'text' | 'xml' | 'record';
  readonly input?: string;
  readonly line?: number;
  readonly cause?: unknown;
}> {}

// ============= Data Type Errors =============

export class DataTypeNotRegisteredError extends Data.TaggedError(
  'DataTypeNotRegisteredError'
)<{
  readonly message: string;
  readonly dataType: string;
}> {}

export class HierarchyError extends Data.TaggedError('HierarchyError')<{
  readonly message: string;
  readonly dataType: string;
}> {}

export class ConversionError extends Data.TaggedError('ConversionError')<{
  readonly message: string;
  readonly value: unknown;
  readonly from: string;
  readonly to: string;
  readonly cause?: unknown;
}> {}

// ============= IO Errors =============

export class FileNotFoundError extends Data.TaggedError('FileNotFoundError')<{
  readonly message: string;
  readonly path: string;
}> {}

export class IoError extends Data.TaggedError('IoError')<{
  readonly message: string;
  readonly operation: 'open' | 'read' | 'write' | 'close';
  readonly path?: string;
  readonly cause?: unknown;
}> {}

// ============= Error Unions =============

export type BuilderError =
  | DuplicateIdError
  | NoConstructError
  | ConstructNotFoundError;

export type RecordingError =
  | BuilderError
  | FormatError
  | DanglingLinkError
  | FileNotFoundError
  | IoError;

// ============= Factories =============

export const conversionError = (
  value: unknown,
  from: string,
  to: string,
  cause?: unknown
) =>
  new ConversionError({
    message: `Can't convert ${describeValue(value)} (${from}) to ${to}`,
    value,
    from,
    to,
    cause,
  });

const describeValue = (value: unknown): string => {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
};
