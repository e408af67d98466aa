import { describe, it, expect } from 'vitest';
import { Effect, Option } from 'effect';
import { runFailure } from '@tests/utils/effect-helpers';
import { ConstructableBuilder } from './builder';
import type { Writable } from './constructable';
import { IdGenerator } from './id-generator';
import { RecordedObject } from './recorded-object';
import { XmlConstructorInstructor } from './xml-instructor';
import { XmlObjectWriter, writeXmlDocument } from './xml-object-writer';

const writable = (
  attributes: ReadonlyArray<[string, string]>,
  links: () => ReadonlyArray<[string, Writable]> = () => []
): Writable => ({
  getAttributes: () => new Map(attributes),
  getLinks: () => new Map(links()),
});

const counting = () => {
  let next = 9n;
  return new IdGenerator('#', () => {
    next += 1n;
    return next;
  });
};

const newWriter = () =>
  new XmlObjectWriter(undefined, { generator: counting() });

const readBack = (xml: string) =>
  Effect.runPromise(
    new XmlConstructorInstructor(
      new ConstructableBuilder(RecordedObject.factory, { danglingLinks: 'fail' })
    ).constructFrom(xml)
  );

describe('XmlObjectWriter', () => {
  it('should write objects as prefixed elements with CDATA values', async () => {
    const b = writable([['name', 'second']]);
    const a = writable([['name', 'first']], () => [['next', b]]);
    const writer = newWriter();

    const xml = await Effect.runPromise(
      Effect.gen(function* () {
        yield* writer.writeAll([a, b]);
        return yield* writer.closeDocument();
      })
    );

    expect(xml.startsWith('<?xml')).toBe(true);
    expect(xml).toContain('<root>');
    expect(xml).toContain('<![CDATA[first]]>');
    expect(xml).toContain('<![CDATA[#b]]>');
    expect(xml.trimEnd().endsWith('</root>')).toBe(true);

    const { constructs } = await readBack(xml);
    expect([...constructs.keys()]).toEqual(['#a', '#b']);
    expect(
      Option.flatMap(Option.fromNullable(constructs.get('#a')), (o) =>
        o.getAttribute('name')
      )
    ).toEqual(Option.some('first'));
    expect(constructs.get('#a')?.getLinks().get('next')).toBe(
      constructs.get('#b')
    );
  });

  it('should keep values containing markup and the CDATA terminator', async () => {
    const tricky = 'a <b> & c ]]> d';
    const xml = await Effect.runPromise(
      writeXmlDocument([writable([['text', tricky]])])
    );
    const { constructs } = await readBack(xml);
    const [object] = [...constructs.values()];
    expect(object?.getAttribute('text')).toEqual(Option.some(tricky));
  });

  it('should group objects under instruction elements', async () => {
    const writer = newWriter();
    const xml = await Effect.runPromise(
      Effect.gen(function* () {
        yield* writer.openDocument('recording');
        yield* writer.openInstruction('nodes');
        yield* writer.writeInto(writable([['v', '1']]));
        yield* writer.openInstruction('edges');
        yield* writer.writeInto(writable([['v', '2']]));
        return yield* writer.closeDocument();
      })
    );

    expect(xml).toContain('<recording>');
    const { constructs } = await readBack(xml);
    expect(constructs.get('#a')?.instruction).toEqual(Option.some('nodes'));
    expect(constructs.get('#b')?.instruction).toEqual(Option.some('edges'));
  });

  it('should refuse element names XML cannot carry', async () => {
    const badKey = await runFailure(
      newWriter().writeInto(writable([['two words', 'v']]))
    );
    expect(badKey).toMatchObject({ _tag: 'FormatError', format: 'xml' });

    const badInstruction = await runFailure(newWriter().openInstruction('_a'));
    expect(badInstruction.message).toBe('Instruction _a would be read as an object');
  });

  it('should refuse values that would not read back', async () => {
    const error = await runFailure(
      newWriter().writeInto(writable([['empty', '']]))
    );
    expect(error.message).toBe('Attribute empty cannot be read back as written');
  });

  it('should not open a document twice', async () => {
    const writer = newWriter();
    await Effect.runPromise(writer.openDocument());
    const error = await runFailure(writer.openDocument());
    expect(error.message).toBe('The document is already open');
  });

  it('should write an empty root when nothing was written', async () => {
    const xml = await Effect.runPromise(writeXmlDocument([]));
    const { constructs } = await readBack(xml);
    expect(constructs.size).toBe(0);
  });
});
