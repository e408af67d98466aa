/**
 * Line Reader - Instruction lines from strings and files
 *
 * Lines lose their terminator and leading whitespace; trailing whitespace
 * is kept as part of attribute values. Blank lines and comment lines are
 * dropped. Files are opened as scoped resources and closed on every exit.
 */

import { Effect, Stream, pipe } from 'effect';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { FileNotFoundError, IoError } from '../errors';
import { logWarn } from '../utils/logging';

export interface SourceLine {
  readonly text: string;
  /** 1-based position in the source, counting skipped lines. */
  readonly number: number;
}

export interface LineFilter {
  readonly commentIndicator?: string | undefined;
}

export const cleanLine = (raw: string): string =>
  raw.replace(/\r$/, '').replace(/^\s+/, '');

const keepLine = (text: string, filter: LineFilter): boolean =>
  text.length > 0 &&
  !(filter.commentIndicator !== undefined &&
    text.startsWith(filter.commentIndicator));

export const splitLines = (
  content: string,
  filter: LineFilter = {}
): ReadonlyArray<SourceLine> =>
  content
    .split('\n')
    .map((raw, index) => ({ text: cleanLine(raw), number: index + 1 }))
    .filter((line) => keepLine(line.text, filter));

// ============= Files =============

const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const openFailure = (path: string) => (error: unknown) =>
  isNotFound(error)
    ? new FileNotFoundError({ message: `File not found: ${path}`, path })
    : new IoError({
        message: `Failed to open ${path}: ${errorText(error)}`,
        operation: 'open',
        path,
        cause: error,
      });

const openFile = (path: string) =>
  Effect.tryPromise({
    try: () => fs.open(path, 'r'),
    catch: openFailure(path),
  });

const closeFile = (handle: FileHandle, path: string) =>
  pipe(
    Effect.tryPromise(() => handle.close()),
    Effect.catchAll((error) =>
      logWarn('Failed to close file', {
        module: 'LineReader',
        operation: 'close',
        metadata: { path, error: errorText(error) },
      })
    )
  );

/**
 * Stream the kept lines of a file.
 */
export const streamLines = (
  path: string,
  filter: LineFilter = {}
): Stream.Stream<SourceLine, FileNotFoundError | IoError> =>
  Stream.unwrapScoped(
    Effect.gen(function* () {
      const handle = yield* Effect.acquireRelease(openFile(path), (handle) =>
        closeFile(handle, path)
      );

      return pipe(
        Stream.fromAsyncIterable(
          handle.readLines({ autoClose: false }),
          (error) =>
            new IoError({
              message: `Failed to read ${path}: ${errorText(error)}`,
              operation: 'read',
              path,
              cause: error,
            })
        ),
        Stream.zipWithIndex,
        Stream.map(([raw, index]) => ({
          text: cleanLine(raw),
          number: index + 1,
        })),
        Stream.filter((line) => keepLine(line.text, filter))
      );
    })
  );

/**
 * Read a whole UTF-8 file.
 */
export const readTextFile = (
  path: string
): Effect.Effect<string, FileNotFoundError | IoError> =>
  Effect.tryPromise({
    try: () => fs.readFile(path, 'utf8'),
    catch: openFailure(path),
  });
