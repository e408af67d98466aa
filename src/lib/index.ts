/**
 * @fileoverview flow-recording – Main Entry Point
 *
 * @description Typed values with a data type registry and conversion graph,
 * plus reading and writing object graphs as text or XML recordings.
 *
 * ## Key Exports
 *
 * ### Values
 * - `Value`, `BasicDataType`, `ExtraBoolean`
 * - `DataTypeRegistry` service with `DataTypeRegistryLive` / `DataTypeRegistryDefault`
 *
 * ### Recordings
 * - `ConstructableBuilder` fed by `TextConstructorInstructor` or `XmlConstructorInstructor`
 * - `TextObjectWriter` and `XmlObjectWriter`
 * - `readRecording` / `writeRecording` choosing the format from the file extension
 *
 * ## Usage Examples
 *
 * ```typescript
 * import { Effect, pipe } from 'effect'
 * import {
 *   ConstructableBuilder,
 *   RecordedObject,
 *   TextConstructorInstructor,
 * } from 'flow-recording'
 *
 * const builder = new ConstructableBuilder(RecordedObject.factory)
 * const result = await Effect.runPromise(
 *   new TextConstructorInstructor(builder).constructFromString(
 *     '#a\nname=first\nnext=#b\n#b\nname=second\n'
 *   )
 * )
 * ```
 */

// ============= Errors =============
export * from './errors';

// ============= Values and Data Types =============
export {
  BasicDataType,
  basicDataTypes,
  makeDataType,
  sameType,
  type DataType,
} from './generics/data-type';
export { ExtraBoolean } from './generics/extra-boolean';
export {
  ConversionReliability,
  isBetterThan,
  worstOf,
} from './generics/conversion-reliability';
export {
  ConversionGraph,
  type ConversionRoute,
} from './generics/conversion-graph';
export {
  supportsInput,
  supportsOutput,
  type Conversion,
  type ValueParser,
} from './generics/value-parser';
export {
  formatDate,
  formatDateTime,
  makeBasicValueParser,
  type BasicValueParserOptions,
} from './generics/basic-value-parser';
export { Value } from './generics/value';

// ============= Services =============
export {
  ConfigService,
  ConfigServiceDefault,
  ConfigServiceLive,
  ConfigServiceTest,
  defaultConfig,
  getRecordingConfig,
  loadConfigFromEnv,
  type Config,
  type ConfigOverrides,
  type DanglingLinkPolicy,
  type NumericStringPolicy,
  type RecordingConfig,
} from './services/config';
export { DataTypeRegistry } from './services/data-types/service';
export {
  DataTypeRegistryDefault,
  DataTypeRegistryLive,
  DataTypeRegistryTest,
  makeDataTypeRegistry,
} from './services/data-types/registry';

// ============= Recording =============
export { IdGenerator, ID_INDICATOR } from './recording/id-generator';
export {
  isIdentified,
  type Constructable,
  type ConstructableFactory,
  type IdentifiedWritable,
  type Writable,
} from './recording/constructable';
export { RecordedObject } from './recording/recorded-object';
export {
  ConstructableBuilder,
  type BuilderOptions,
  type BuildResult,
  type DanglingLink,
} from './recording/builder';
export {
  TextConstructorInstructor,
  defaultTextFormat,
  textFormatFrom,
  type TextFormat,
} from './recording/text-instructor';
export {
  XmlConstructorInstructor,
  defaultXmlFormat,
  xmlFormatFrom,
  type XmlFormat,
} from './recording/xml-instructor';
export { ObjectWriter, type ObjectWriterOptions } from './recording/object-writer';
export {
  TextObjectWriter,
  reachableFrom,
} from './recording/text-object-writer';
export {
  XmlObjectWriter,
  writeXmlDocument,
  xmlWriterFormatFrom,
  type XmlWriterFormat,
} from './recording/xml-object-writer';
export {
  formatOf,
  parseRecording,
  readRecording,
  renderRecording,
  writeRecording,
  type RecordingFormat,
} from './recording/recording-io';

// ============= IO =============
export { splitLines, streamLines, readTextFile } from './io/line-reader';
export { joinLines, writeLines, writeTextFile } from './io/file-writer';
export { readXmlEvents, XmlEvent } from './io/xml-events';

// ============= Structure =============
export { Graph, GraphEdge, GraphNode } from './structure/graph';
export {
  GraphRecording,
  numberParser,
  stringParser,
  type ObjectParser,
} from './structure/graph-recording';

// ============= Logging =============
export { loggingLayer, type LogLevelName } from './utils/logging';
