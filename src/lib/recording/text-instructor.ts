/**
 * TextConstructorInstructor - Drives a builder from text instruction lines
 *
 * `#id` opens an object, `key=value` sets an attribute, `key=#id` a link,
 * and a line starting with the instruction indicator sets the instruction
 * context for the objects that follow.
 */

import { Effect, Option, Stream, pipe } from 'effect';
import {
  FormatError,
  type BuilderError,
  type DanglingLinkError,
  type FileNotFoundError,
  type IoError,
} from '../errors';
import { splitLines, streamLines, type SourceLine } from '../io/line-reader';
import { defaultConfig, type RecordingConfig } from '../services/config';
import { logDebug } from '../utils/logging';
import type { BuildResult, ConstructableBuilder } from './builder';
import type { Constructable } from './constructable';

export interface TextFormat {
  readonly idIndicator: string;
  /** None disables instruction lines. */
  readonly instructionIndicator: Option.Option<string>;
  readonly commentIndicator?: string | undefined;
}

export const textFormatFrom = (config: RecordingConfig): TextFormat => ({
  idIndicator: config.idIndicator,
  instructionIndicator: Option.some(config.instructionIndicator),
  commentIndicator: config.commentIndicator,
});

export const defaultTextFormat: TextFormat = textFormatFrom(
  defaultConfig.recording
);

export type TextLineError = BuilderError | FormatError;

export class TextConstructorInstructor<
  T extends Constructable<T, E>,
  E = never,
> {
  constructor(
    readonly builder: ConstructableBuilder<T, E>,
    readonly format: TextFormat = defaultTextFormat
  ) {}

  /**
   * Dispatch one cleaned line to the builder.
   */
  onLine(
    text: string,
    lineNumber?: number
  ): Effect.Effect<void, TextLineError | E> {
    const { idIndicator, instructionIndicator } = this.format;

    if (
      Option.isSome(instructionIndicator) &&
      text.startsWith(instructionIndicator.value)
    ) {
      this.builder.setInstruction(
        text.slice(instructionIndicator.value.length).trim()
      );
      return Effect.void;
    }

    if (text.startsWith(idIndicator)) {
      return Effect.asVoid(this.builder.create(text.trimEnd()));
    }

    const separator = text.indexOf('=');
    if (separator === -1 || separator === text.length - 1) {
      return Effect.fail(
        new FormatError({
          message: 'Attributes must have values',
          format: 'text',
          input: text,
          line: lineNumber,
        })
      );
    }

    const key = text.slice(0, separator);
    const value = text.slice(separator + 1);
    return value.startsWith(idIndicator)
      ? this.builder.addLink(key, value.trimEnd())
      : this.builder.addAttribute(key, value);
  }

  onLines(
    lines: Iterable<SourceLine>
  ): Effect.Effect<void, TextLineError | E> {
    return Effect.forEach(lines, (line) => this.onLine(line.text, line.number), {
      discard: true,
    });
  }

  /**
   * Build a fresh session from the whole content.
   */
  constructFromString(
    content: string
  ): Effect.Effect<BuildResult<T>, TextLineError | DanglingLinkError | E> {
    return Effect.gen(this, function* () {
      this.builder.reset();
      const lines = splitLines(content, this.format);
      yield* this.onLines(lines);
      yield* logDebug('Read text recording', {
        module: 'TextConstructorInstructor',
        operation: 'constructFromString',
        metadata: { lines: lines.length },
      });
      return yield* this.builder.finish();
    });
  }

  constructFromFile(
    path: string
  ): Effect.Effect<
    BuildResult<T>,
    TextLineError | DanglingLinkError | FileNotFoundError | IoError | E
  > {
    return Effect.gen(this, function* () {
      this.builder.reset();
      yield* pipe(
        streamLines(path, this.format),
        Stream.runForEach((line) => this.onLine(line.text, line.number))
      );
      yield* logDebug('Read text recording', {
        module: 'TextConstructorInstructor',
        operation: 'constructFromFile',
        metadata: { path },
      });
      return yield* this.builder.finish();
    });
  }
}
