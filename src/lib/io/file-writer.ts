/**
 * File Writer - Writes recordings to disk
 */

import { Effect } from 'effect';
import { promises as fs } from 'fs';
import { IoError } from '../errors';

export const joinLines = (lines: Iterable<string>): string =>
  Array.from(lines, (line) => `${line}\n`).join('');

export const writeTextFile = (
  path: string,
  content: string
): Effect.Effect<void, IoError> =>
  Effect.tryPromise({
    try: () => fs.writeFile(path, content, 'utf8'),
    catch: (error) =>
      new IoError({
        message: `Failed to write ${path}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        operation: 'write',
        path,
        cause: error,
      }),
  });

export const writeLines = (
  path: string,
  lines: Iterable<string>
): Effect.Effect<void, IoError> => writeTextFile(path, joinLines(lines));
