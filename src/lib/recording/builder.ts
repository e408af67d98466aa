/**
 * ConstructableBuilder - Builds a graph of constructs from instructions
 *
 * Holds one session: constructs by id, the latest construct that attribute
 * and link instructions apply to, links waiting for their target to be
 * created, and the instruction context handed to the factory. A builder is
 * not safe for concurrent use; call `reset` between sessions.
 */

import { Effect, Option } from 'effect';
import {
  ConstructNotFoundError,
  DanglingLinkError,
  DuplicateIdError,
  NoConstructError,
} from '../errors';
import type { DanglingLinkPolicy } from '../services/config';
import { logDebug, logWarn } from '../utils/logging';
import type { Constructable, ConstructableFactory } from './constructable';

// ============= Types =============

export interface BuilderOptions {
  readonly danglingLinks?: DanglingLinkPolicy;
}

/**
 * Link names a construct declared towards an id that was never created.
 */
export interface DanglingLink {
  readonly targetId: string;
  readonly constructId: string;
  readonly names: ReadonlyArray<string>;
}

export interface BuildResult<T> {
  readonly constructs: ReadonlyMap<string, T>;
  readonly danglingLinks: ReadonlyArray<DanglingLink>;
}

// ============= Builder =============

export class ConstructableBuilder<T extends Constructable<T, E>, E = never> {
  private readonly constructs = new Map<string, T>();
  // target id -> querying construct id -> link names, in arrival order
  private readonly pendingLinks = new Map<string, Map<string, string[]>>();
  private latest: Option.Option<T> = Option.none();
  private instruction: Option.Option<string> = Option.none();

  constructor(
    private readonly factory: ConstructableFactory<T>,
    private readonly options: BuilderOptions = {}
  ) {}

  create(id: string): Effect.Effect<T, DuplicateIdError | E> {
    return Effect.gen(this, function* () {
      if (this.constructs.has(id)) {
        return yield* Effect.fail(
          new DuplicateIdError({
            message: `IDs must be unique: ${id} already exists`,
            id,
          })
        );
      }

      const construct = this.factory(this.instruction);
      construct.setId(id);
      this.constructs.set(id, construct);
      this.latest = Option.some(construct);

      const bucket = this.pendingLinks.get(id);
      if (bucket) {
        const queriers = bucket.size;
        // Entries leave the bucket only once linked, so a failed link
        // leaves the rest pending
        for (const [querierId, names] of bucket) {
          const querier = this.constructs.get(querierId);
          if (!querier) {
            yield* logWarn('Pending link from an unknown construct', {
              module: 'ConstructableBuilder',
              operation: 'create',
              id: querierId,
              instruction: Option.getOrUndefined(this.instruction),
              metadata: { target: id, links: names.join(',') },
            });
            continue;
          }
          for (let name = names[0]; name !== undefined; name = names[0]) {
            yield* querier.setLink(name, construct);
            names.shift();
          }
          bucket.delete(querierId);
        }
        if (bucket.size === 0) {
          this.pendingLinks.delete(id);
        }
        yield* logDebug('Resolved pending links', {
          module: 'ConstructableBuilder',
          operation: 'create',
          id,
          instruction: Option.getOrUndefined(this.instruction),
          metadata: { queriers: queriers - bucket.size },
        });
      }

      return construct;
    });
  }

  addAttribute(
    name: string,
    value: string
  ): Effect.Effect<void, NoConstructError | E> {
    return Option.match(this.latest, {
      onNone: () => Effect.fail(noConstruct('addAttribute')),
      onSome: (construct) => construct.setAttribute(name, value),
    });
  }

  /**
   * Link the latest construct to `targetId`, now if the target exists,
   * otherwise once it is created.
   */
  addLink(
    name: string,
    targetId: string
  ): Effect.Effect<void, NoConstructError | E> {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.latest)) {
        return yield* Effect.fail(noConstruct('addLink'));
      }
      const latest = this.latest.value;

      const target = this.constructs.get(targetId);
      if (target) {
        return yield* latest.setLink(name, target);
      }

      let bucket = this.pendingLinks.get(targetId);
      if (!bucket) {
        bucket = new Map();
        this.pendingLinks.set(targetId, bucket);
      }
      const names = bucket.get(latest.getId()) ?? [];
      names.push(name);
      bucket.set(latest.getId(), names);
    });
  }

  setInstruction(instruction: string): void {
    this.instruction = Option.some(instruction);
  }

  moveTo(target: string | T): Effect.Effect<T, ConstructNotFoundError> {
    const id = typeof target === 'string' ? target : target.getId();
    const construct = this.constructs.get(id);
    if (!construct || (typeof target !== 'string' && construct !== target)) {
      return Effect.fail(
        new ConstructNotFoundError({
          message: `No construct with id ${id} in this session`,
          id,
        })
      );
    }
    this.latest = Option.some(construct);
    return Effect.succeed(construct);
  }

  reset(): void {
    this.constructs.clear();
    this.pendingLinks.clear();
    this.latest = Option.none();
    this.instruction = Option.none();
  }

  // ============= Session State =============

  getConstructs(): ReadonlyMap<string, T> {
    return this.constructs;
  }

  getConstruct(id: string): Option.Option<T> {
    return Option.fromNullable(this.constructs.get(id));
  }

  getLatestConstruct(): Option.Option<T> {
    return this.latest;
  }

  getInstruction(): Option.Option<string> {
    return this.instruction;
  }

  getPendingLinks(): ReadonlyArray<DanglingLink> {
    const pending: DanglingLink[] = [];
    for (const [targetId, bucket] of this.pendingLinks) {
      for (const [constructId, names] of bucket) {
        pending.push({ targetId, constructId, names: [...names] });
      }
    }
    return pending;
  }

  /**
   * End the session, reporting links whose target never appeared
   * according to the dangling link policy.
   */
  finish(): Effect.Effect<BuildResult<T>, DanglingLinkError> {
    return Effect.gen(this, function* () {
      const danglingLinks = this.getPendingLinks();
      const policy = this.options.danglingLinks ?? 'warn';

      if (danglingLinks.length > 0) {
        const ids = [...new Set(danglingLinks.map((link) => link.targetId))];
        if (policy === 'fail') {
          return yield* Effect.fail(
            new DanglingLinkError({
              message: `Links to missing objects: ${ids.join(', ')}`,
              ids,
            })
          );
        }
        if (policy === 'warn') {
          yield* logWarn('Links to missing objects remain unresolved', {
            module: 'ConstructableBuilder',
            operation: 'finish',
            metadata: { ids: ids.join(' ') },
          });
        }
      }

      return { constructs: new Map(this.constructs), danglingLinks };
    });
  }
}

const noConstruct = (operation: 'addAttribute' | 'addLink') =>
  new NoConstructError({
    message: 'No objects constructed yet',
    operation,
  });
