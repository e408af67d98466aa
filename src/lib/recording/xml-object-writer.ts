/**
 * XmlObjectWriter - Writes writables as an XML recording
 *
 * Objects become elements named by their id, with the id indicator
 * replaced by the XML id prefix. Each attribute and link is a child
 * element holding its value as CDATA. Objects can be grouped under
 * instruction elements directly below the document root.
 */

import { Effect, Option } from 'effect';
import { createCB } from 'xmlbuilder2';
import { FormatError } from '../errors';
import { defaultConfig, type RecordingConfig } from '../services/config';
import type { Writable } from './constructable';
import { ObjectWriter, type ObjectWriterOptions } from './object-writer';

export interface XmlWriterFormat {
  readonly idIndicator: string;
  readonly xmlIdPrefix: string;
  readonly xmlRootName: string;
}

export const xmlWriterFormatFrom = (
  config: RecordingConfig
): XmlWriterFormat => ({
  idIndicator: config.idIndicator,
  xmlIdPrefix: config.xmlIdPrefix,
  xmlRootName: config.xmlRootName,
});

type CallbackBuilder = ReturnType<typeof createCB>;

const XML_NAME = /^[A-Za-z_][A-Za-z0-9._-]*$/;
const CDATA_END = ']]>';

const xmlError = (message: string, input?: string) =>
  new FormatError({ message, format: 'xml', input });

const checkName = (name: string): Effect.Effect<void, FormatError> =>
  XML_NAME.test(name) && !name.toLowerCase().startsWith('xml')
    ? Effect.void
    : Effect.fail(xmlError(`${JSON.stringify(name)} is not a usable element name`, name));

/**
 * Split a value so no CDATA section contains the terminator.
 */
const cdataSections = (value: string): ReadonlyArray<string> => {
  const parts = value.split(CDATA_END);
  return parts.map(
    (part, index) =>
      (index > 0 ? '>' : '') + part + (index < parts.length - 1 ? ']]' : '')
  );
};

export class XmlObjectWriter extends ObjectWriter {
  private readonly chunks: string[] = [];
  private readonly errors: Error[] = [];
  private document: Option.Option<CallbackBuilder> = Option.none();
  private instructionOpen = false;
  private closed = false;

  constructor(
    readonly format: XmlWriterFormat = xmlWriterFormatFrom(
      defaultConfig.recording
    ),
    options: Omit<ObjectWriterOptions, 'idIndicator'> = {}
  ) {
    super({ ...options, idIndicator: format.idIndicator });
  }

  openDocument(
    name: string = this.format.xmlRootName
  ): Effect.Effect<void, FormatError> {
    return Effect.gen(this, function* () {
      if (Option.isSome(this.document) || this.closed) {
        return yield* Effect.fail(xmlError('The document is already open'));
      }
      yield* checkName(name);

      const xml = createCB({
        data: (chunk: string) => {
          this.chunks.push(chunk);
        },
        error: (error: Error) => {
          this.errors.push(error);
        },
        prettyPrint: false,
      });
      xml.dec({ version: '1.0', encoding: 'UTF-8' }).ele(name);
      this.document = Option.some(xml);
      yield* this.checkErrors();
    });
  }

  /**
   * Group the objects written next under `name`, closing any open group.
   */
  openInstruction(name: string): Effect.Effect<void, FormatError> {
    return Effect.gen(this, function* () {
      yield* checkName(name);
      if (name.startsWith(this.format.xmlIdPrefix)) {
        return yield* Effect.fail(
          xmlError(`Instruction ${name} would be read as an object`, name)
        );
      }
      const xml = yield* this.openedDocument();
      this.closeOpenInstruction(xml);
      xml.ele(name);
      this.instructionOpen = true;
      yield* this.checkErrors();
    });
  }

  closeInstruction(): Effect.Effect<void, FormatError> {
    return Effect.gen(this, function* () {
      const xml = yield* this.openedDocument();
      this.closeOpenInstruction(xml);
      yield* this.checkErrors();
    });
  }

  writeInto(writable: Writable): Effect.Effect<void, FormatError> {
    return Effect.gen(this, function* () {
      const xml = yield* this.openedDocument();
      const id = this.getIdFor(writable);
      const elementName =
        this.format.xmlIdPrefix + id.slice(this.format.idIndicator.length);
      yield* checkName(elementName);

      const attributes = [...writable.getAttributes()];
      for (const [key, value] of attributes) {
        yield* checkName(key);
        if (value === '' || value.startsWith(this.format.idIndicator)) {
          return yield* Effect.fail(
            xmlError(`Attribute ${key} cannot be read back as written`, value)
          );
        }
      }
      const links = [...writable.getLinks()];
      for (const [key] of links) {
        yield* checkName(key);
      }

      xml.ele(elementName);
      for (const [key, value] of attributes) {
        this.writeValue(xml, key, value);
      }
      for (const [key, target] of links) {
        this.writeValue(xml, key, this.getIdFor(target));
      }
      xml.up();
      yield* this.checkErrors();
    });
  }

  writeAll(writables: Iterable<Writable>): Effect.Effect<void, FormatError> {
    return Effect.forEach(writables, (writable) => this.writeInto(writable), {
      discard: true,
    });
  }

  /**
   * Close every open element and return the document text.
   */
  closeDocument(): Effect.Effect<string, FormatError> {
    return Effect.gen(this, function* () {
      const xml = yield* this.openedDocument();
      this.closeOpenInstruction(xml);
      xml.up().end();
      this.document = Option.none();
      this.closed = true;
      yield* this.checkErrors();
      return this.getOutput();
    });
  }

  getOutput(): string {
    return this.chunks.join('');
  }

  private openedDocument(): Effect.Effect<CallbackBuilder, FormatError> {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.document)) {
        yield* this.openDocument();
      }
      return yield* Option.match(this.document, {
        onNone: () => Effect.fail(xmlError('The document is closed')),
        onSome: (xml) => Effect.succeed(xml),
      });
    });
  }

  private closeOpenInstruction(xml: CallbackBuilder): void {
    if (this.instructionOpen) {
      xml.up();
      this.instructionOpen = false;
    }
  }

  private writeValue(xml: CallbackBuilder, key: string, value: string): void {
    xml.ele(key);
    for (const section of cdataSections(value)) {
      xml.dat(section);
    }
    xml.up();
  }

  private checkErrors(): Effect.Effect<void, FormatError> {
    const [first] = this.errors;
    return first
      ? Effect.fail(
          new FormatError({
            message: `Failed to write XML: ${first.message}`,
            format: 'xml',
            cause: first,
          })
        )
      : Effect.void;
  }
}

export interface XmlDocumentOptions {
  readonly format?: XmlWriterFormat;
  readonly instruction?: string;
}

/**
 * Write writables as one complete document.
 */
export const writeXmlDocument = (
  writables: Iterable<Writable>,
  options: XmlDocumentOptions = {}
): Effect.Effect<string, FormatError> =>
  Effect.gen(function* () {
    const writer = new XmlObjectWriter(options.format);
    yield* writer.openDocument();
    if (options.instruction !== undefined) {
      yield* writer.openInstruction(options.instruction);
    }
    yield* writer.writeAll(writables);
    return yield* writer.closeDocument();
  });
