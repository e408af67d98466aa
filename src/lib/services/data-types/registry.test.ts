import { describe, it, expect } from 'vitest';
import { Effect, Exit, Layer, Option } from 'effect';
import { ConversionError } from '../../errors';
import { ConversionReliability } from '../../generics/conversion-reliability';
import { BasicDataType as T, makeDataType } from '../../generics/data-type';
import { Value } from '../../generics/value';
import type { ValueParser } from '../../generics/value-parser';
import { ConfigServiceTest } from '../config';
import { makeDataTypeRegistry, DataTypeRegistryLive } from './registry';
import { DataTypeRegistry } from './service';

const withRegistry = <A, E>(effect: Effect.Effect<A, E, DataTypeRegistry>) =>
  Effect.provideServiceEffect(
    effect,
    DataTypeRegistry,
    makeDataTypeRegistry()
  );

const runRegistryTest = <A, E>(
  effect: Effect.Effect<A, E, DataTypeRegistry>
) => Effect.runPromise(withRegistry(effect));

const runRegistryExit = <A, E>(
  effect: Effect.Effect<A, E, DataTypeRegistry>
) => Effect.runPromiseExit(withRegistry(effect));

const MONEY = makeDataType('MONEY');

const moneyParser: ValueParser = {
  name: 'money',
  supportedInputTypes: [MONEY],
  supportedOutputTypes: [T.STRING],
  conversions: [
    { from: MONEY, to: T.STRING, reliability: ConversionReliability.PERFECT },
  ],
  parse: (raw) => Effect.succeed(`$${String(raw)}`),
};

describe('DataTypeRegistry', () => {
  describe('hierarchy', () => {
    it('should answer is-a queries along the parent chain', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          expect(yield* registry.isOfType(T.INTEGER, T.NUMBER)).toBe(true);
          expect(yield* registry.isOfType(T.NUMBER, T.INTEGER)).toBe(false);
          expect(yield* registry.isOfType(T.INTEGER, T.INTEGER)).toBe(true);
          expect(yield* registry.isOfType(T.STRING, T.NUMBER)).toBe(false);
        })
      );
    });

    it('should terminate ancestor walks after re-registration', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          yield* registry.register(T.NUMBER);
          for (const child of [T.INTEGER, T.DOUBLE, T.LONG]) {
            yield* registry.register(child, T.NUMBER);
          }
          yield* registry.register(T.INTEGER, T.NUMBER);

          for (const child of [T.INTEGER, T.DOUBLE, T.LONG]) {
            expect(yield* registry.isOfType(child, T.NUMBER)).toBe(true);
          }
        })
      );
    });

    it('should detach children when their parent is replaced', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          yield* registry.register(T.NUMBER);

          expect(yield* registry.isOfType(T.INTEGER, T.NUMBER)).toBe(false);
          expect(Option.isNone(yield* registry.parentOf(T.DOUBLE))).toBe(true);
        })
      );
    });

    it('should fail for unregistered types and parents', async () => {
      const exit = await runRegistryExit(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* registry.isOfType(MONEY, T.NUMBER);
        })
      );
      expect(Exit.isFailure(exit)).toBe(true);

      const failure = await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* Effect.flip(registry.register(T.STRING, MONEY));
        })
      );
      expect(failure._tag).toBe('DataTypeNotRegisteredError');
    });

    it('should refuse a type as its own parent', async () => {
      const failure = await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* Effect.flip(registry.register(MONEY, MONEY));
        })
      );
      expect(failure._tag).toBe('HierarchyError');
    });

    it('should register new types under existing parents', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          expect(yield* registry.contains(MONEY)).toBe(false);
          yield* registry.register(MONEY, T.DOUBLE);
          expect(yield* registry.isOfType(MONEY, T.NUMBER)).toBe(true);
          expect(yield* registry.parentOf(MONEY)).toEqual(Option.some(T.DOUBLE));
        })
      );
    });
  });

  describe('parsers', () => {
    it('should try primary parsers first and ignore duplicates', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const shouting: ValueParser = {
            name: 'shouting',
            supportedInputTypes: [T.INTEGER],
            supportedOutputTypes: [T.STRING],
            conversions: [],
            parse: (raw) => Effect.succeed(`${String(raw)}!`),
          };

          yield* registry.addParser(shouting, true);
          yield* registry.addParser(shouting, false);
          const names = (yield* registry.parsers()).map((p) => p.name);
          expect(names).toEqual(['shouting', 'basic']);

          const value = yield* registry.convert(3, T.INTEGER, T.STRING);
          expect(value.getRawValue()).toBe('3!');
        })
      );
    });

    it('should merge the supported types of every parser', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          yield* registry.addParser(moneyParser);
          const inputs = (yield* registry.supportedInputTypes()).map(
            (type) => type.name
          );
          expect(inputs).toContain('MONEY');
          expect(inputs).toContain('DATETIME');

          const value = yield* registry.convert(5, MONEY, T.STRING);
          expect(value.getRawValue()).toBe('$5');
        })
      );
    });
  });

  describe('convert', () => {
    it('should convert through the basic parser', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const value = yield* registry.convert('42', T.STRING, T.INTEGER);
          expect(value.getType()).toEqual(T.INTEGER);
          expect(value.getRawValue()).toBe(42);
        })
      );
    });

    it('should keep same-type values unchanged', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const value = yield* registry.convert('x', T.STRING, T.STRING);
          expect(value.getRawValue()).toBe('x');
        })
      );
    });

    it('should check same-type payloads against their type', async () => {
      const failure = await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* Effect.flip(registry.convert('abc', T.INTEGER, T.INTEGER));
        })
      );
      expect(failure).toBeInstanceOf(ConversionError);
      expect(failure.to).toBe('INTEGER');
    });

    it('should pass same-type payloads of types without a parser through', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const value = yield* registry.convert(5, MONEY, MONEY);
          expect(value.getRawValue()).toBe(5);
          expect(value.getType()).toEqual(MONEY);
        })
      );
    });

    it('should convert null payloads into typed nulls', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const value = yield* registry.cast(Value.nullOf(T.STRING), T.DOUBLE);
          expect(value.isNull()).toBe(true);
          expect(value.getType()).toEqual(T.DOUBLE);
        })
      );
    });

    it('should fail with a ConversionError when no parser matches', async () => {
      const failure = await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* Effect.flip(registry.convert('a', T.STRING, MONEY));
        })
      );
      expect(failure).toBeInstanceOf(ConversionError);
      expect(failure.message).toBe('No parser converts STRING to MONEY');
    });
  });

  describe('conversionReliability', () => {
    it('should be perfect for a type and its ancestors', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          expect(yield* registry.conversionReliability(T.INTEGER, T.NUMBER)).toEqual(
            Option.some(ConversionReliability.PERFECT)
          );
          expect(yield* registry.conversionReliability(T.DATE, T.DATE)).toEqual(
            Option.some(ConversionReliability.PERFECT)
          );
        })
      );
    });

    it('should follow declared conversions', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          expect(yield* registry.conversionReliability(T.STRING, T.DOUBLE)).toEqual(
            Option.some(ConversionReliability.UNRELIABLE)
          );
          expect(yield* registry.conversionReliability(T.BOOLEAN, T.STRING)).toEqual(
            Option.some(ConversionReliability.RELIABLE)
          );
          const missing = yield* registry.conversionReliability(T.STRING, MONEY);
          expect(Option.isNone(missing)).toBe(true);
        })
      );
    });

    it('should pick the cheapest target type', async () => {
      await runRegistryTest(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          const target = yield* registry.findOptimalTargetType(T.BOOLEAN, [
            T.STRING,
            T.EXTRA_BOOLEAN,
          ]);
          expect(target).toEqual(Option.some(T.EXTRA_BOOLEAN));
        })
      );
    });
  });

  it('should take the numeric string policy from config', async () => {
    const exit = await Effect.runPromiseExit(
      Effect.provide(
        Effect.gen(function* () {
          const registry = yield* DataTypeRegistry;
          return yield* registry.convert('4.2', T.STRING, T.INTEGER);
        }),
        DataTypeRegistryLive.pipe(
          Layer.provide(
            ConfigServiceTest({ conversion: { numericStrings: 'strict' } })
          )
        )
      )
    );
    expect(Exit.isFailure(exit)).toBe(true);
  });
});
