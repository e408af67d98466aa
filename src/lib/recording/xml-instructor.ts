/**
 * XmlConstructorInstructor - Drives a builder from XML element events
 *
 * The root element is skipped. Outside an object, an element whose name
 * starts with the XML id prefix opens an object and any other element
 * directly under the root sets the instruction context. Every element
 * directly inside an object is an attribute or link whose text is
 * dispatched when it closes.
 */

import { Effect, Option } from 'effect';
import {
  FormatError,
  type BuilderError,
  type DanglingLinkError,
  type FileNotFoundError,
  type IoError,
} from '../errors';
import { readTextFile } from '../io/line-reader';
import { readXmlEvents, type XmlEvent } from '../io/xml-events';
import { defaultConfig, type RecordingConfig } from '../services/config';
import { logDebug } from '../utils/logging';
import type { BuildResult, ConstructableBuilder } from './builder';
import type { Constructable } from './constructable';

export interface XmlFormat {
  readonly idIndicator: string;
  readonly xmlIdPrefix: string;
}

export const xmlFormatFrom = (config: RecordingConfig): XmlFormat => ({
  idIndicator: config.idIndicator,
  xmlIdPrefix: config.xmlIdPrefix,
});

export const defaultXmlFormat: XmlFormat = xmlFormatFrom(
  defaultConfig.recording
);

export type XmlEventError = BuilderError | FormatError;

interface OpenAttribute {
  readonly name: string;
  text: string;
}

const structureError = (message: string, input?: string) =>
  new FormatError({ message, format: 'xml', input });

export class XmlConstructorInstructor<
  T extends Constructable<T, E>,
  E = never,
> {
  private depth = 0;
  private objectDepth: Option.Option<number> = Option.none();
  private attribute: Option.Option<OpenAttribute> = Option.none();

  constructor(
    readonly builder: ConstructableBuilder<T, E>,
    readonly format: XmlFormat = defaultXmlFormat
  ) {}

  onEvent(event: XmlEvent): Effect.Effect<void, XmlEventError | E> {
    switch (event._tag) {
      case 'Start':
        return this.onStart(event.name);
      case 'Text':
        return this.onText(event.text);
      case 'End':
        return this.onEnd();
    }
  }

  constructFrom(
    content: string
  ): Effect.Effect<BuildResult<T>, XmlEventError | DanglingLinkError | E> {
    return Effect.gen(this, function* () {
      this.builder.reset();
      this.depth = 0;
      this.objectDepth = Option.none();
      this.attribute = Option.none();

      const events = yield* readXmlEvents(content);
      yield* Effect.forEach(events, (event) => this.onEvent(event), {
        discard: true,
      });
      yield* logDebug('Read XML recording', {
        module: 'XmlConstructorInstructor',
        operation: 'constructFrom',
        metadata: { events: events.length },
      });
      return yield* this.builder.finish();
    });
  }

  constructFromFile(
    path: string
  ): Effect.Effect<
    BuildResult<T>,
    XmlEventError | DanglingLinkError | FileNotFoundError | IoError | E
  > {
    return Effect.flatMap(readTextFile(path), (content) =>
      this.constructFrom(content)
    );
  }

  private onStart(name: string): Effect.Effect<void, XmlEventError | E> {
    this.depth += 1;

    if (this.depth === 1) {
      return Effect.void;
    }

    if (Option.isSome(this.attribute)) {
      return Effect.fail(
        structureError(
          `Element <${name}> cannot be nested in attribute <${this.attribute.value.name}>`,
          name
        )
      );
    }

    if (Option.isSome(this.objectDepth)) {
      this.attribute = Option.some({ name, text: '' });
      return Effect.void;
    }

    if (name.startsWith(this.format.xmlIdPrefix)) {
      this.objectDepth = Option.some(this.depth);
      const id =
        this.format.idIndicator + name.slice(this.format.xmlIdPrefix.length);
      return Effect.asVoid(this.builder.create(id));
    }

    if (this.depth === 2) {
      this.builder.setInstruction(name);
      return Effect.void;
    }

    return Effect.fail(
      structureError(
        `Element <${name}> is neither an object nor an instruction`,
        name
      )
    );
  }

  private onText(text: string): Effect.Effect<void, FormatError> {
    if (Option.isSome(this.attribute)) {
      this.attribute.value.text += text;
      return Effect.void;
    }
    if (text.trim() === '') {
      return Effect.void;
    }
    return Effect.fail(
      structureError(
        'The XML is not valid: character data outside an attribute element',
        text
      )
    );
  }

  private onEnd(): Effect.Effect<void, XmlEventError | E> {
    const closing = this.depth;
    this.depth -= 1;

    if (Option.isSome(this.attribute)) {
      const { name, text } = this.attribute.value;
      this.attribute = Option.none();
      if (text === '') {
        return Effect.void;
      }
      return text.startsWith(this.format.idIndicator)
        ? this.builder.addLink(name, text)
        : this.builder.addAttribute(name, text);
    }

    if (Option.isSome(this.objectDepth) && this.objectDepth.value === closing) {
      this.objectDepth = Option.none();
    }
    return Effect.void;
  }
}
