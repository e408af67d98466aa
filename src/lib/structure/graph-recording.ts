/**
 * GraphRecording - Records graphs as writables and rebuilds them
 *
 * Each node becomes one RecordedObject with the attributes `id` and `data`.
 * An edge leaving the node is a link keyed by the edge id plus the
 * attributes `<edgeId>.data` and `<edgeId>.bothWays`. Node and edge data
 * pass through ObjectParsers.
 */

import { Effect, Option } from 'effect';
import {
  type ConstructNotFoundError,
  type DuplicateIdError,
  FormatError,
} from '../errors';
import { ConstructableBuilder, type BuilderOptions } from '../recording/builder';
import { RecordedObject } from '../recording/recorded-object';
import { Graph } from './graph';

export interface ObjectParser<T> {
  parseToString(value: T): string;
  parseFromString(text: string): Effect.Effect<T, FormatError>;
}

export const stringParser: ObjectParser<string> = {
  parseToString: (value) => value,
  parseFromString: (text) => Effect.succeed(text),
};

export const numberParser: ObjectParser<number> = {
  parseToString: (value) => String(value),
  parseFromString: (text) => {
    const parsed = Number(text);
    return text.trim() !== '' && Number.isFinite(parsed)
      ? Effect.succeed(parsed)
      : Effect.fail(recordError(`Can't parse a number from ${text}`, text));
  },
};

export type GraphReadError =
  | FormatError
  | DuplicateIdError
  | ConstructNotFoundError;

const ID = 'id';
const DATA = 'data';
const edgeDataKey = (edgeId: string) => `${edgeId}.data`;
const bothWaysKey = (edgeId: string) => `${edgeId}.bothWays`;

function recordError(message: string, input?: string): FormatError {
  return new FormatError({ message, format: 'record', input });
}

const requireAttribute = (
  record: RecordedObject,
  name: string
): Effect.Effect<string, FormatError> =>
  Option.match(record.getAttribute(name), {
    onNone: () =>
      Effect.fail(
        recordError(`Recorded node ${record.getId()} has no ${name}`)
      ),
    onSome: Effect.succeed,
  });

const parseBothWays = (
  record: RecordedObject,
  edgeId: string
): Effect.Effect<boolean, FormatError> =>
  Option.match(record.getAttribute(bothWaysKey(edgeId)), {
    onNone: () => Effect.succeed(false),
    onSome: (text) =>
      text === 'true' || text === 'false'
        ? Effect.succeed(text === 'true')
        : Effect.fail(
            recordError(`Edge ${edgeId} has an invalid direction ${text}`, text)
          ),
  });

export class GraphRecording<N, E> {
  constructor(
    readonly nodeParser: ObjectParser<N>,
    readonly edgeParser: ObjectParser<E>
  ) {}

  /**
   * A builder producing constructs that `toGraph` understands.
   */
  createBuilder(
    options: BuilderOptions = {}
  ): ConstructableBuilder<RecordedObject> {
    return new ConstructableBuilder(RecordedObject.factory, options);
  }

  /**
   * One writable per node, in node order. Edges are recorded on their
   * start node only.
   */
  record(graph: Graph<N, E>): Effect.Effect<ReadonlyArray<RecordedObject>> {
    return Effect.gen(this, function* () {
      const records = new Map<string, RecordedObject>();
      for (const node of graph.getNodes()) {
        const record = new RecordedObject();
        yield* record.setAttribute(ID, node.id);
        yield* record.setAttribute(
          DATA,
          this.nodeParser.parseToString(node.data)
        );
        records.set(node.id, record);
      }

      for (const node of graph.getNodes()) {
        const record = records.get(node.id);
        if (!record) continue;
        for (const edge of node.getLeavingEdges()) {
          const target = records.get(edge.end.id);
          if (edge.start !== node || !target) continue;
          yield* record.setAttribute(
            edgeDataKey(edge.id),
            this.edgeParser.parseToString(edge.data)
          );
          yield* record.setAttribute(
            bothWaysKey(edge.id),
            String(edge.bothWays)
          );
          yield* record.setLink(edge.id, target);
        }
      }

      return [...records.values()];
    });
  }

  /**
   * Rebuild a graph from recorded nodes.
   */
  toGraph(
    records: Iterable<RecordedObject>
  ): Effect.Effect<Graph<N, E>, GraphReadError> {
    return Effect.gen(this, function* () {
      const graph = new Graph<N, E>();
      const all = [...records];

      for (const record of all) {
        const id = yield* requireAttribute(record, ID);
        const text = yield* requireAttribute(record, DATA);
        const data = yield* this.nodeParser.parseFromString(text);
        yield* graph.addNode(id, data);
      }

      for (const record of all) {
        const startId = yield* requireAttribute(record, ID);
        for (const [edgeId, target] of record.getLinks()) {
          const endId = yield* requireAttribute(target, ID);
          const text = yield* requireAttribute(record, edgeDataKey(edgeId));
          const data = yield* this.edgeParser.parseFromString(text);
          const bothWays = yield* parseBothWays(record, edgeId);
          yield* graph.connectNodes(startId, endId, edgeId, data, bothWays);
        }
      }

      return graph;
    });
  }
}
