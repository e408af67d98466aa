/**
 * TextObjectWriter - Writes writables as text instruction lines
 */

import { Effect, Option } from 'effect';
import { FormatError, type IoError } from '../errors';
import { writeLines } from '../io/file-writer';
import type { Writable } from './constructable';
import { ObjectWriter, type ObjectWriterOptions } from './object-writer';
import { defaultTextFormat, type TextFormat } from './text-instructor';

const LINE_BREAK = /[\r\n]/;

/**
 * All writables reachable through links, starting ones first.
 */
export const reachableFrom = (
  writables: Iterable<Writable>
): ReadonlyArray<Writable> => {
  const seen = new Set<Writable>();
  const queue = [...writables];
  const ordered: Writable[] = [];
  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    if (seen.has(next)) continue;
    seen.add(next);
    ordered.push(next);
    queue.push(...next.getLinks().values());
  }
  return ordered;
};

export class TextObjectWriter extends ObjectWriter {
  constructor(
    readonly format: TextFormat = defaultTextFormat,
    options: Omit<ObjectWriterOptions, 'idIndicator'> = {}
  ) {
    super({ ...options, idIndicator: format.idIndicator });
  }

  /**
   * The id line, then one line per attribute, then one per link.
   */
  writeInto(
    writable: Writable
  ): Effect.Effect<ReadonlyArray<string>, FormatError> {
    return Effect.gen(this, function* () {
      const lines = [this.getIdFor(writable)];

      for (const [key, value] of writable.getAttributes()) {
        yield* this.checkKey(key);
        if (value === '' || LINE_BREAK.test(value)) {
          return yield* Effect.fail(
            textError(`Attribute ${key} needs a one-line value`, value)
          );
        }
        if (value.startsWith(this.format.idIndicator)) {
          return yield* Effect.fail(
            textError(`Attribute ${key} would be read as a link`, value)
          );
        }
        lines.push(`${key}=${value}`);
      }

      for (const [key, target] of writable.getLinks()) {
        yield* this.checkKey(key);
        lines.push(`${key}=${this.getIdFor(target)}`);
      }

      return lines;
    });
  }

  writeAll(
    writables: Iterable<Writable>
  ): Effect.Effect<ReadonlyArray<string>, FormatError> {
    return Effect.map(
      Effect.forEach(writables, (writable) => this.writeInto(writable)),
      (chunks) => chunks.flat()
    );
  }

  instructionLine(instruction: string): Effect.Effect<string, FormatError> {
    return Option.match(this.format.instructionIndicator, {
      onNone: () =>
        Effect.fail(textError('Instruction lines are disabled', instruction)),
      onSome: (indicator) =>
        LINE_BREAK.test(instruction)
          ? Effect.fail(textError('Instructions must be one line', instruction))
          : Effect.succeed(indicator + instruction),
    });
  }

  writeFile(
    path: string,
    writables: Iterable<Writable>
  ): Effect.Effect<void, FormatError | IoError> {
    return Effect.flatMap(this.writeAll(writables), (lines) =>
      writeLines(path, lines)
    );
  }

  private checkKey(key: string): Effect.Effect<void, FormatError> {
    const { idIndicator, instructionIndicator, commentIndicator } = this.format;
    const reserved =
      key === '' ||
      key.includes('=') ||
      LINE_BREAK.test(key) ||
      /^\s/.test(key) ||
      key.startsWith(idIndicator) ||
      (Option.isSome(instructionIndicator) &&
        key.startsWith(instructionIndicator.value)) ||
      (commentIndicator !== undefined && key.startsWith(commentIndicator));
    return reserved
      ? Effect.fail(textError(`Key ${JSON.stringify(key)} is reserved`, key))
      : Effect.void;
  }
}

const textError = (message: string, input: string) =>
  new FormatError({ message, format: 'text', input });
