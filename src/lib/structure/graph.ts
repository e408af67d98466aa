/**
 * Graph - Directed graph with identified nodes and edges
 *
 * An edge leaves its start node; a both-ways edge also leaves its end node.
 * Node ids are unique in a graph, edge ids are unique among the edges
 * leaving one node.
 */

import { Effect, Option } from 'effect';
import { ConstructNotFoundError, DuplicateIdError } from '../errors';

export class GraphNode<N, E> {
  private readonly leaving = new Map<string, GraphEdge<N, E>>();

  constructor(
    readonly id: string,
    readonly data: N
  ) {}

  getLeavingEdges(): ReadonlyArray<GraphEdge<N, E>> {
    return [...this.leaving.values()];
  }

  getLeavingEdge(edgeId: string): Option.Option<GraphEdge<N, E>> {
    return Option.fromNullable(this.leaving.get(edgeId));
  }

  /** Nodes reachable over one leaving edge. */
  getEndNodes(): ReadonlyArray<GraphNode<N, E>> {
    return this.getLeavingEdges().map((edge) => edge.otherEnd(this));
  }

  /** @internal */
  attach(edge: GraphEdge<N, E>): void {
    this.leaving.set(edge.id, edge);
  }

  /** @internal */
  detach(edge: GraphEdge<N, E>): void {
    if (this.leaving.get(edge.id) === edge) {
      this.leaving.delete(edge.id);
    }
  }
}

export class GraphEdge<N, E> {
  constructor(
    readonly id: string,
    readonly start: GraphNode<N, E>,
    readonly end: GraphNode<N, E>,
    readonly data: E,
    readonly bothWays: boolean
  ) {}

  connects(a: GraphNode<N, E>, b: GraphNode<N, E>): boolean {
    return (
      (this.start === a && this.end === b) ||
      (this.start === b && this.end === a)
    );
  }

  otherEnd(node: GraphNode<N, E>): GraphNode<N, E> {
    return node === this.start ? this.end : this.start;
  }
}

export class Graph<N, E> {
  private readonly nodes = new Map<string, GraphNode<N, E>>();

  // ============= Nodes =============

  addNode(
    id: string,
    data: N
  ): Effect.Effect<GraphNode<N, E>, DuplicateIdError> {
    if (this.nodes.has(id)) {
      return Effect.fail(
        new DuplicateIdError({
          message: `Node ${id} already exists`,
          id,
        })
      );
    }
    const node = new GraphNode<N, E>(id, data);
    this.nodes.set(id, node);
    return Effect.succeed(node);
  }

  getNode(id: string): Option.Option<GraphNode<N, E>> {
    return Option.fromNullable(this.nodes.get(id));
  }

  contains(id: string): boolean {
    return this.nodes.has(id);
  }

  /**
   * Remove a node together with every edge touching it.
   */
  removeNode(id: string): void {
    const node = this.nodes.get(id);
    if (!node) return;
    for (const edge of this.getEdges()) {
      if (edge.start === node || edge.end === node) {
        edge.start.detach(edge);
        edge.end.detach(edge);
      }
    }
    this.nodes.delete(id);
  }

  getNodes(): ReadonlyArray<GraphNode<N, E>> {
    return [...this.nodes.values()];
  }

  getNodeIds(): ReadonlyArray<string> {
    return [...this.nodes.keys()];
  }

  size(): number {
    return this.nodes.size;
  }

  // ============= Edges =============

  connectNodes(
    startId: string,
    endId: string,
    edgeId: string,
    data: E,
    bothWays = false
  ): Effect.Effect<
    GraphEdge<N, E>,
    ConstructNotFoundError | DuplicateIdError
  > {
    return Effect.gen(this, function* () {
      const start = yield* this.requireNode(startId);
      const end = yield* this.requireNode(endId);
      const clash =
        Option.isSome(start.getLeavingEdge(edgeId)) ||
        (bothWays && Option.isSome(end.getLeavingEdge(edgeId)));
      if (clash) {
        return yield* Effect.fail(
          new DuplicateIdError({
            message: `Edge ${edgeId} already leaves ${startId}`,
            id: edgeId,
          })
        );
      }

      const edge = new GraphEdge(edgeId, start, end, data, bothWays);
      start.attach(edge);
      if (bothWays) end.attach(edge);
      return edge;
    });
  }

  /** Every edge once, in node order. */
  getEdges(): ReadonlyArray<GraphEdge<N, E>> {
    const edges = new Set<GraphEdge<N, E>>();
    for (const node of this.nodes.values()) {
      for (const edge of node.getLeavingEdges()) edges.add(edge);
    }
    return [...edges];
  }

  nodesAreDirectlyConnected(aId: string, bId: string): boolean {
    const a = this.nodes.get(aId);
    const b = this.nodes.get(bId);
    if (!a || !b) return false;
    return this.getEdges().some((edge) => edge.connects(a, b));
  }

  // ============= Traversal =============

  /**
   * Nodes reachable from `startId` following edge directions, start included.
   */
  reachableFrom(startId: string): ReadonlyArray<GraphNode<N, E>> {
    const start = this.nodes.get(startId);
    if (!start) return [];

    const seen = new Set<GraphNode<N, E>>([start]);
    const queue = [start];
    for (let next = queue.shift(); next; next = queue.shift()) {
      for (const node of next.getEndNodes()) {
        if (!seen.has(node)) {
          seen.add(node);
          queue.push(node);
        }
      }
    }
    return [...seen];
  }

  traversingIsPossible(startId: string, endId: string): boolean {
    return this.reachableFrom(startId).some((node) => node.id === endId);
  }

  private requireNode(
    id: string
  ): Effect.Effect<GraphNode<N, E>, ConstructNotFoundError> {
    return Option.match(this.getNode(id), {
      onNone: () =>
        Effect.fail(
          new ConstructNotFoundError({
            message: `Node ${id} is not part of the graph`,
            id,
          })
        ),
      onSome: Effect.succeed,
    });
  }
}
