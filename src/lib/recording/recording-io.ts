/**
 * Recording IO - Read and write recordings in either format
 *
 * The format follows the file extension: `.xml` is XML, anything else is
 * text. Indicators, the XML id prefix and the dangling link policy come
 * from the ConfigService.
 */

import { extname } from 'path';
import { Effect, Equivalence, Option } from 'effect';
import type {
  FileNotFoundError,
  FormatError,
  IoError,
  RecordingError,
} from '../errors';
import { writeTextFile, joinLines } from '../io/file-writer';
import {
  type ConfigService,
  getRecordingConfig,
  type RecordingConfig,
} from '../services/config';
import { logInfo, withOperationLogging } from '../utils/logging';
import { ConstructableBuilder, type BuildResult } from './builder';
import type { Writable } from './constructable';
import { RecordedObject } from './recorded-object';
import { TextConstructorInstructor, textFormatFrom } from './text-instructor';
import { TextObjectWriter, reachableFrom } from './text-object-writer';
import { XmlConstructorInstructor, xmlFormatFrom } from './xml-instructor';
import { XmlObjectWriter, xmlWriterFormatFrom } from './xml-object-writer';

export type RecordingFormat = 'text' | 'xml';

export const formatOf = (path: string): RecordingFormat =>
  extname(path).toLowerCase() === '.xml' ? 'xml' : 'text';

const instructionOf = (writable: Writable): Option.Option<string> =>
  writable instanceof RecordedObject ? writable.instruction : Option.none();

const sameInstruction = Option.getEquivalence(Equivalence.string);

/**
 * Neither format can return to "no instruction" once one is set, so
 * writables without one come first, then one group per instruction in
 * first-seen order.
 */
const groupByInstruction = (
  writables: ReadonlyArray<Writable>
): ReadonlyArray<Writable> => {
  const groups = new Map<string, Writable[]>();
  const plain: Writable[] = [];
  for (const writable of writables) {
    const instruction = instructionOf(writable);
    if (Option.isNone(instruction)) {
      plain.push(writable);
      continue;
    }
    const group = groups.get(instruction.value);
    if (group) group.push(writable);
    else groups.set(instruction.value, [writable]);
  }
  return [...plain, ...[...groups.values()].flat()];
};

const newBuilder = (recording: RecordingConfig) =>
  new ConstructableBuilder(RecordedObject.factory, {
    danglingLinks: recording.danglingLinks,
  });

// ============= Reading =============

export const readRecording = (
  path: string,
  format: RecordingFormat = formatOf(path)
): Effect.Effect<BuildResult<RecordedObject>, RecordingError, ConfigService> =>
  Effect.gen(function* () {
    const recording = yield* getRecordingConfig;
    const builder = newBuilder(recording);
    const read: Effect.Effect<BuildResult<RecordedObject>, RecordingError> =
      format === 'xml'
        ? new XmlConstructorInstructor(
            builder,
            xmlFormatFrom(recording)
          ).constructFromFile(path)
        : new TextConstructorInstructor(
            builder,
            textFormatFrom(recording)
          ).constructFromFile(path);
    const result = yield* withOperationLogging('readRecording', read, {
      module: 'RecordingIO',
      metadata: { path, format },
    });

    yield* logInfo('Read recording', {
      module: 'RecordingIO',
      operation: 'readRecording',
      metadata: {
        path,
        format,
        objects: result.constructs.size,
        danglingLinks: result.danglingLinks.length,
      },
    });
    return result;
  });

type ParseError = Exclude<RecordingError, FileNotFoundError | IoError>;

export const parseRecording = (
  content: string,
  format: RecordingFormat
): Effect.Effect<BuildResult<RecordedObject>, ParseError, ConfigService> =>
  Effect.gen(function* () {
    const recording = yield* getRecordingConfig;
    const builder = newBuilder(recording);
    const parse: Effect.Effect<BuildResult<RecordedObject>, ParseError> =
      format === 'xml'
        ? new XmlConstructorInstructor(
            builder,
            xmlFormatFrom(recording)
          ).constructFrom(content)
        : new TextConstructorInstructor(
            builder,
            textFormatFrom(recording)
          ).constructFromString(content);
    return yield* parse;
  });

// ============= Writing =============

const renderText = (
  writables: ReadonlyArray<Writable>,
  recording: RecordingConfig
) =>
  Effect.gen(function* () {
    const writer = new TextObjectWriter(textFormatFrom(recording));
    const lines: string[] = [];
    let current = Option.none<string>();
    for (const writable of writables) {
      const instruction = instructionOf(writable);
      if (
        Option.isSome(instruction) &&
        !Option.contains(current, instruction.value)
      ) {
        lines.push(yield* writer.instructionLine(instruction.value));
        current = instruction;
      }
      lines.push(...(yield* writer.writeInto(writable)));
    }
    return joinLines(lines);
  });

const renderXml = (
  writables: ReadonlyArray<Writable>,
  recording: RecordingConfig
) =>
  Effect.gen(function* () {
    const writer = new XmlObjectWriter(xmlWriterFormatFrom(recording));
    yield* writer.openDocument();
    let current = Option.none<string>();
    for (const writable of writables) {
      const instruction = instructionOf(writable);
      if (!sameInstruction(current, instruction)) {
        yield* Option.match(instruction, {
          onNone: () => writer.closeInstruction(),
          onSome: (name) => writer.openInstruction(name),
        });
        current = instruction;
      }
      yield* writer.writeInto(writable);
    }
    return yield* writer.closeDocument();
  });

/**
 * Render writables and everything they link to, grouped by the
 * instruction each recorded object was read under.
 */
export const renderRecording = (
  writables: Iterable<Writable>,
  format: RecordingFormat
): Effect.Effect<string, FormatError, ConfigService> =>
  Effect.gen(function* () {
    const recording = yield* getRecordingConfig;
    const all = groupByInstruction(reachableFrom(writables));
    return yield* format === 'xml'
      ? renderXml(all, recording)
      : renderText(all, recording);
  });

export const writeRecording = (
  path: string,
  writables: Iterable<Writable>,
  format: RecordingFormat = formatOf(path)
): Effect.Effect<void, FormatError | IoError, ConfigService> =>
  Effect.gen(function* () {
    const content = yield* renderRecording(writables, format);
    yield* writeTextFile(path, content);
    yield* logInfo('Wrote recording', {
      module: 'RecordingIO',
      operation: 'writeRecording',
      metadata: { path, format },
    });
  });
