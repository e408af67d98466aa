/**
 * XML Events - Document-order element events from UTF-8 XML
 */

import { Data, Effect } from 'effect';
import { SaxesParser } from 'saxes';
import { FormatError } from '../errors';

export type XmlEvent = Data.TaggedEnum<{
  Start: { readonly name: string };
  Text: { readonly text: string };
  End: { readonly name: string };
}>;

export const XmlEvent = Data.taggedEnum<XmlEvent>();

/**
 * Parse a document into start/text/end events. CDATA sections arrive as
 * text; the first syntax error fails the whole read.
 */
export const readXmlEvents = (
  content: string
): Effect.Effect<ReadonlyArray<XmlEvent>, FormatError> =>
  Effect.suspend(() => {
    const events: XmlEvent[] = [];
    const errors: Error[] = [];
    const parser = new SaxesParser();

    parser.on('opentag', (tag) => {
      events.push(XmlEvent.Start({ name: tag.name }));
    });
    parser.on('text', (text) => {
      events.push(XmlEvent.Text({ text }));
    });
    parser.on('cdata', (cdata) => {
      events.push(XmlEvent.Text({ text: cdata }));
    });
    parser.on('closetag', (tag) => {
      events.push(XmlEvent.End({ name: tag.name }));
    });
    parser.on('error', (error) => {
      errors.push(error);
    });

    return Effect.flatMap(
      Effect.try({
        try: () => parser.write(content).close(),
        catch: (error) =>
          new FormatError({
            message: `The XML is not well formed: ${String(error)}`,
            format: 'xml',
            cause: error,
          }),
      }),
      () => {
        const [first] = errors;
        return first
          ? Effect.fail(
              new FormatError({
                message: `The XML is not well formed: ${first.message}`,
                format: 'xml',
                cause: first,
              })
            )
          : Effect.succeed(events);
      }
    );
  });
