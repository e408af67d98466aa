import { describe, it, expect } from 'vitest';
import { Effect, Exit, Option } from 'effect';
import { ConstructableBuilder, type BuilderOptions } from './builder';
import type { Constructable } from './constructable';
import { RecordedObject } from './recorded-object';

const newBuilder = (options: BuilderOptions = {}) =>
  new ConstructableBuilder(RecordedObject.factory, options);

const linkIdOf = (object: RecordedObject, name: string) =>
  Option.map(object.getLink(name), (target) => target.getId());

describe('ConstructableBuilder', () => {
  it('should create constructs and apply attributes to the latest one', async () => {
    const builder = newBuilder();
    await Effect.runPromise(
      Effect.gen(function* () {
        yield* builder.create('#a');
        yield* builder.addAttribute('name', 'first');
        yield* builder.create('#b');
        yield* builder.addAttribute('name', 'second');
      })
    );

    const a = builder.getConstruct('#a');
    expect(Option.flatMap(a, (o) => o.getAttribute('name'))).toEqual(
      Option.some('first')
    );
    expect(
      Option.map(builder.getLatestConstruct(), (o) => o.getId())
    ).toEqual(Option.some('#b'));
  });

  it('should link immediately when the target exists', async () => {
    const builder = newBuilder();
    const b = await Effect.runPromise(
      Effect.gen(function* () {
        yield* builder.create('#a');
        const b = yield* builder.create('#b');
        yield* builder.addLink('prev', '#a');
        return b;
      })
    );
    expect(linkIdOf(b, 'prev')).toEqual(Option.some('#a'));
    expect(builder.getPendingLinks()).toEqual([]);
  });

  it('should resolve forward references once the target is created', async () => {
    const builder = newBuilder();
    const calls: string[] = [];
    const a = await Effect.runPromise(
      Effect.gen(function* () {
        const a = yield* builder.create('#a');
        yield* builder.addLink('next', '#b');
        expect(builder.getPendingLinks()).toEqual([
          { targetId: '#b', constructId: '#a', names: ['next'] },
        ]);
        const original = a.setLink.bind(a);
        a.setLink = (name, target) => {
          calls.push(`${name}->${target.getId()}`);
          return original(name, target);
        };
        const b = yield* builder.create('#b');
        yield* builder.addAttribute('label', 'after');
        expect(b.getAttributes().get('label')).toBe('after');
        return a;
      })
    );

    expect(calls).toEqual(['next->#b']);
    expect(linkIdOf(a, 'next')).toEqual(Option.some('#b'));
    expect(builder.getPendingLinks()).toEqual([]);
  });

  it('should resolve several queriers of the same id in arrival order', async () => {
    const builder = newBuilder();
    const order: string[] = [];
    const track = (object: RecordedObject) => {
      const original = object.setLink.bind(object);
      object.setLink = (name, target) => {
        order.push(`${object.getId()}.${name}`);
        return original(name, target);
      };
    };

    await Effect.runPromise(
      Effect.gen(function* () {
        track(yield* builder.create('#x'));
        yield* builder.addLink('to', '#z');
        yield* builder.addLink('also', '#z');
        track(yield* builder.create('#y'));
        yield* builder.addLink('to', '#z');
        yield* builder.create('#z');
      })
    );

    expect(order).toEqual(['#x.to', '#x.also', '#y.to']);
  });

  it('should keep queued links pending when one of them fails', async () => {
    class Picky implements Constructable<Picky, string> {
      private id = '';
      readonly linked: string[] = [];

      getId() {
        return this.id;
      }

      setId(id: string) {
        this.id = id;
      }

      setAttribute() {
        return Effect.void;
      }

      setLink(name: string, target: Picky): Effect.Effect<void, string> {
        return name === 'broken'
          ? Effect.fail(`cannot link ${name}`)
          : Effect.sync(() => {
              this.linked.push(`${name}->${target.getId()}`);
            });
      }
    }

    const builder = new ConstructableBuilder<Picky, string>(() => new Picky());
    const failure = await Effect.runPromise(
      Effect.flip(
        Effect.gen(function* () {
          yield* builder.create('#a');
          yield* builder.addLink('first', '#c');
          yield* builder.addLink('broken', '#c');
          yield* builder.addLink('last', '#c');
          yield* builder.create('#b');
          yield* builder.addLink('other', '#c');
          yield* builder.create('#c');
        })
      )
    );

    expect(failure).toBe('cannot link broken');
    expect(Option.map(builder.getConstruct('#a'), (a) => a.linked)).toEqual(
      Option.some(['first->#c'])
    );
    expect(builder.getPendingLinks()).toEqual([
      { targetId: '#c', constructId: '#a', names: ['broken', 'last'] },
      { targetId: '#c', constructId: '#b', names: ['other'] },
    ]);
  });

  it('should reject duplicate ids and keep the first construct', async () => {
    const builder = newBuilder();
    const exit = await Effect.runPromiseExit(
      Effect.gen(function* () {
        yield* builder.create('#x');
        yield* builder.addAttribute('kept', 'yes');
        yield* builder.create('#x');
      })
    );

    expect(Exit.isFailure(exit)).toBe(true);
    const failure = await Effect.runPromise(Effect.flip(builder.create('#x')));
    expect(failure._tag).toBe('DuplicateIdError');
    expect(failure.message).toBe('IDs must be unique: #x already exists');
    const first = builder.getConstruct('#x');
    expect(Option.flatMap(first, (o) => o.getAttribute('kept'))).toEqual(
      Option.some('yes')
    );
  });

  it('should fail attribute and link instructions before any create', async () => {
    const builder = newBuilder();
    const attribute = await Effect.runPromise(
      Effect.flip(builder.addAttribute('a', 'b'))
    );
    const link = await Effect.runPromise(Effect.flip(builder.addLink('a', '#b')));
    expect(attribute.message).toBe('No objects constructed yet');
    expect(attribute.operation).toBe('addAttribute');
    expect(link.operation).toBe('addLink');
  });

  it('should pass the instruction context to the factory', async () => {
    const builder = newBuilder();
    const [first, second] = await Effect.runPromise(
      Effect.gen(function* () {
        const first = yield* builder.create('#1');
        builder.setInstruction('people');
        const second = yield* builder.create('#2');
        return [first, second] as const;
      })
    );
    expect(first.instruction).toEqual(Option.none());
    expect(second.instruction).toEqual(Option.some('people'));
  });

  it('should move the cursor back to an existing construct', async () => {
    const builder = newBuilder();
    await Effect.runPromise(
      Effect.gen(function* () {
        yield* builder.create('#a');
        yield* builder.create('#b');
        yield* builder.moveTo('#a');
        yield* builder.addAttribute('edited', 'true');
      })
    );
    const a = builder.getConstruct('#a');
    expect(Option.flatMap(a, (o) => o.getAttribute('edited'))).toEqual(
      Option.some('true')
    );

    const missing = await Effect.runPromise(Effect.flip(builder.moveTo('#nope')));
    expect(missing._tag).toBe('ConstructNotFoundError');
    const stranger = new RecordedObject();
    stranger.setId('#a');
    const foreign = await Effect.runPromise(Effect.flip(builder.moveTo(stranger)));
    expect(foreign.id).toBe('#a');
  });

  it('should clear the whole session on reset', async () => {
    const builder = newBuilder();
    await Effect.runPromise(
      Effect.gen(function* () {
        yield* builder.create('#a');
        yield* builder.addLink('next', '#b');
        builder.setInstruction('ctx');
      })
    );
    builder.reset();

    expect(builder.getConstructs().size).toBe(0);
    expect(builder.getPendingLinks()).toEqual([]);
    expect(Option.isNone(builder.getLatestConstruct())).toBe(true);
    expect(Option.isNone(builder.getInstruction())).toBe(true);
    await Effect.runPromise(builder.create('#a'));
  });

  describe('finish', () => {
    const withDangling = (builder: ConstructableBuilder<RecordedObject>) =>
      Effect.gen(function* () {
        yield* builder.create('#a');
        yield* builder.addLink('next', '#ghost');
        return yield* builder.finish();
      });

    it('should report dangling links under the ignore and warn policies', async () => {
      for (const policy of ['ignore', 'warn'] as const) {
        const result = await Effect.runPromise(
          withDangling(newBuilder({ danglingLinks: policy }))
        );
        expect(result.constructs.size).toBe(1);
        expect(result.danglingLinks).toEqual([
          { targetId: '#ghost', constructId: '#a', names: ['next'] },
        ]);
      }
    });

    it('should fail under the fail policy', async () => {
      const failure = await Effect.runPromise(
        Effect.flip(withDangling(newBuilder({ danglingLinks: 'fail' })))
      );
      expect(failure._tag).toBe('DanglingLinkError');
      expect(failure.ids).toEqual(['#ghost']);
    });
  });
});
