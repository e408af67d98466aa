/**
 * DataTypeRegistry - Ref-backed implementation and layers
 */

import { Effect, HashMap, Layer, Option, Ref, pipe } from 'effect';
import {
  ConversionError,
  DataTypeNotRegisteredError,
  HierarchyError,
} from '../../errors';
import {
  makeBasicValueParser,
  type BasicValueParserOptions,
} from '../../generics/basic-value-parser';
import { ConversionGraph } from '../../generics/conversion-graph';
import { ConversionReliability } from '../../generics/conversion-reliability';
import {
  BasicDataType,
  basicDataTypes,
  type DataType,
} from '../../generics/data-type';
import { Value } from '../../generics/value';
import {
  supportsInput,
  supportsOutput,
  type ValueParser,
} from '../../generics/value-parser';
import { logDebug } from '../../utils/logging';
import { ConfigService } from '../config';
import { DataTypeRegistry } from './service';

// ============= State =============

interface TypeNode {
  readonly type: DataType;
  readonly parent: Option.Option<string>;
}

interface RegistryState {
  readonly nodes: HashMap.HashMap<string, TypeNode>;
  readonly parsers: ReadonlyArray<ValueParser>;
  readonly graph: ConversionGraph;
}

const NUMERIC_CHILDREN = [
  BasicDataType.INTEGER,
  BasicDataType.DOUBLE,
  BasicDataType.LONG,
];

const notRegistered = (type: DataType) =>
  new DataTypeNotRegisteredError({
    message: `Data type ${type.name} has not been registered`,
    dataType: type.name,
  });

const buildGraph = (parsers: ReadonlyArray<ValueParser>): ConversionGraph => {
  const graph = new ConversionGraph();
  for (const parser of parsers) {
    graph.addAll(parser.conversions);
  }
  return graph;
};

const collectTypes = (
  parsers: ReadonlyArray<ValueParser>,
  select: (parser: ValueParser) => ReadonlyArray<DataType>
): ReadonlyArray<DataType> => {
  const seen = new Map<string, DataType>();
  for (const parser of parsers) {
    for (const type of select(parser)) {
      if (!seen.has(type.name)) seen.set(type.name, type);
    }
  }
  return Array.from(seen.values());
};

/**
 * Walk the parent chain, stopping at the first repeated node.
 */
const ancestry = (
  nodes: HashMap.HashMap<string, TypeNode>,
  start: string
): ReadonlyArray<string> => {
  const chain: string[] = [];
  const visited = new Set<string>();
  let current = Option.some(start);
  while (Option.isSome(current) && !visited.has(current.value)) {
    visited.add(current.value);
    chain.push(current.value);
    current = pipe(
      HashMap.get(nodes, current.value),
      Option.flatMap((node) => node.parent)
    );
  }
  return chain;
};

// ============= Service Implementation =============

export const makeDataTypeRegistry = (
  options: BasicValueParserOptions = { numericStrings: 'lenient' }
): Effect.Effect<DataTypeRegistry> =>
  Effect.gen(function* () {
    const basicParser = makeBasicValueParser(options);

    let nodes = HashMap.empty<string, TypeNode>();
    for (const type of basicDataTypes) {
      nodes = HashMap.set(nodes, type.name, { type, parent: Option.none() });
    }
    for (const child of NUMERIC_CHILDREN) {
      nodes = HashMap.set(nodes, child.name, {
        type: child,
        parent: Option.some(BasicDataType.NUMBER.name),
      });
    }

    const stateRef = yield* Ref.make<RegistryState>({
      nodes,
      parsers: [basicParser],
      graph: buildGraph([basicParser]),
    });

    const requireNode = (type: DataType) =>
      Effect.flatMap(Ref.get(stateRef), (state) =>
        Option.match(HashMap.get(state.nodes, type.name), {
          onNone: () => Effect.fail(notRegistered(type)),
          onSome: (node) => Effect.succeed({ node, state }),
        })
      );

    const register = (type: DataType, parent?: DataType) =>
      Effect.gen(function* () {
        if (parent && parent.name === type.name) {
          return yield* Effect.fail(
            new HierarchyError({
              message: `Data type ${type.name} cannot be its own parent`,
              dataType: type.name,
            })
          );
        }
        if (parent) {
          yield* requireNode(parent);
        }

        yield* Ref.update(stateRef, (state) => {
          const detached = HashMap.map(state.nodes, (node) =>
            Option.contains(node.parent, type.name)
              ? { ...node, parent: Option.none<string>() }
              : node
          );
          return {
            ...state,
            nodes: HashMap.set(detached, type.name, {
              type,
              parent: Option.map(Option.fromNullable(parent), (p) => p.name),
            }),
          };
        });

        yield* logDebug('Registered data type', {
          module: 'DataTypeRegistry',
          operation: 'register',
          metadata: { type: type.name, parent: parent?.name ?? 'none' },
        });
      });

    const isOfType = (type: DataType, ancestor: DataType) =>
      Effect.map(requireNode(type), ({ state }) =>
        ancestry(state.nodes, type.name).includes(ancestor.name)
      );

    const addParser = (parser: ValueParser, isPrimary = false) =>
      Effect.gen(function* () {
        const added = yield* Ref.modify(stateRef, (state) => {
          if (state.parsers.includes(parser)) {
            return [false, state] as const;
          }
          const parsers = isPrimary
            ? [parser, ...state.parsers]
            : [...state.parsers, parser];
          const next = { ...state, parsers, graph: buildGraph(parsers) };
          return [true, next] as const;
        });

        if (added) {
          yield* logDebug('Added value parser', {
            module: 'DataTypeRegistry',
            operation: 'addParser',
            metadata: { parser: parser.name, primary: isPrimary },
          });
        }
      });

    const convert = (raw: unknown, from: DataType, to: DataType) =>
      Effect.gen(function* () {
        const { parsers } = yield* Ref.get(stateRef);
        const parser = parsers.find(
          (candidate) =>
            supportsInput(candidate, from) && supportsOutput(candidate, to)
        );

        // A type no parser reads keeps its payload as given
        if (!parser && from.name === to.name) {
          return Value.of(raw, to);
        }

        if (!parser) {
          return yield* Effect.fail(
            new ConversionError({
              message: `No parser converts ${from.name} to ${to.name}`,
              value: raw,
              from: from.name,
              to: to.name,
            })
          );
        }

        if (raw === null || raw === undefined) {
          return Value.nullOf(to);
        }

        const converted = yield* parser.parse(raw, from, to);
        return Value.of(converted, to);
      });

    const conversionReliability = (from: DataType, to: DataType) =>
      Effect.map(Ref.get(stateRef), (state) => {
        if (ancestry(state.nodes, from.name).includes(to.name)) {
          return Option.some(ConversionReliability.PERFECT);
        }
        return state.graph.reliability(from, to);
      });

    return {
      register,

      contains: (type: DataType) =>
        Effect.map(Ref.get(stateRef), (state) =>
          HashMap.has(state.nodes, type.name)
        ),

      parentOf: (type: DataType) =>
        Effect.map(requireNode(type), ({ node, state }) =>
          pipe(
            node.parent,
            Option.flatMap((name) => HashMap.get(state.nodes, name)),
            Option.map((parentNode) => parentNode.type)
          )
        ),

      isOfType,

      addParser,

      parsers: () => Effect.map(Ref.get(stateRef), (state) => state.parsers),

      supportedInputTypes: () =>
        Effect.map(Ref.get(stateRef), (state) =>
          collectTypes(state.parsers, (parser) => parser.supportedInputTypes)
        ),

      supportedOutputTypes: () =>
        Effect.map(Ref.get(stateRef), (state) =>
          collectTypes(state.parsers, (parser) => parser.supportedOutputTypes)
        ),

      convert,

      cast: (value: Value, to: DataType) =>
        convert(value.getRawValue(), value.getType(), to),

      conversionReliability,

      findOptimalTargetType: (
        from: DataType,
        candidates: ReadonlyArray<DataType>
      ) =>
        Effect.map(Ref.get(stateRef), (state) =>
          state.graph.findOptimalTargetType(from, candidates)
        ),
    };
  });

// ============= Layer Implementations =============

/**
 * Live implementation reading the numeric string policy from config
 */
export const DataTypeRegistryLive = Layer.effect(
  DataTypeRegistry,
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const conversion = yield* config.get('conversion');
    return yield* makeDataTypeRegistry({
      numericStrings: conversion.numericStrings,
    });
  })
);

/**
 * Default implementation with the lenient numeric string policy
 */
export const DataTypeRegistryDefault = Layer.effect(
  DataTypeRegistry,
  makeDataTypeRegistry()
);

/**
 * Test implementation with explicit parser options
 */
export const DataTypeRegistryTest = (options: BasicValueParserOptions) =>
  Layer.effect(DataTypeRegistry, makeDataTypeRegistry(options));
