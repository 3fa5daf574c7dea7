import { Effect } from "effect";
import { dual } from "effect/Function";
import { StoreInvariantError } from "../errors";
import {
  currentCell,
  makeContextSlot,
  type Cell,
  type ContextSlot,
} from "../internal/table";
import { annotate, tableFor } from "../internal/lookup";
import { Store } from "../store";
import { format, type TypeTag } from "../tag/tag";

/**
 * @since 1.0.0
 * @category type ids
 */
export const TypeId: unique symbol = Symbol.for("rooted-state/context");

/**
 * @since 1.0.0
 * @category type ids
 */
export type TypeId = typeof TypeId;

/**
 * A value reachable by type tag alone, from any position. Reads and writes
 * see the innermost override pushed by {@link ContextHandle.provide}, or the
 * base value when no override is active. Only the base value takes part in
 * sweeping; once it has been evicted, the next access through a handle
 * recreates it from that handle's initial value.
 *
 * @since 1.0.0
 * @category models
 */
export interface ContextHandle<A> {
  readonly [TypeId]: TypeId;
  readonly tag: TypeTag<A>;
  readonly initial: A;
  readonly value: Effect.Effect<A>;
  get<R>(reader: (value: A) => R): Effect.Effect<R>;
  set(value: A): Effect.Effect<void>;
  provide: {
    (
      value: A
    ): <X, E, R>(self: Effect.Effect<X, E, R>) => Effect.Effect<X, E, R>;
    <X, E, R>(self: Effect.Effect<X, E, R>, value: A): Effect.Effect<X, E, R>;
  };
}

const resolve = <A>(
  store: Store.Store,
  tag: TypeTag<A>,
  initial: A
): Effect.Effect<ContextSlot<A>> =>
  Effect.gen(function* () {
    const table = yield* tableFor(store, tag);
    if (table.context !== undefined) {
      table.context.touched = true;
      return table.context;
    }
    const slot = makeContextSlot(initial);
    table.context = slot;
    yield* Effect.logDebug("context rooted").pipe(
      Effect.annotateLogs({ tag: format(tag) }),
      annotate(store)
    );
    return slot;
  });

const pop = <A>(
  tag: TypeTag<A>,
  slot: ContextSlot<A>,
  cell: Cell<A>
): Effect.Effect<void> =>
  Effect.suspend(() => {
    if (slot.overrides[slot.overrides.length - 1] !== cell) {
      return Effect.die(
        new StoreInvariantError({
          message: `override for ${format(tag)} is not the innermost one`,
        })
      );
    }
    slot.overrides.pop();
    return Effect.void;
  });

class ContextHandleImpl<A> implements ContextHandle<A> {
  readonly [TypeId]: TypeId = TypeId;

  constructor(
    private readonly store: Store.Store,
    readonly tag: TypeTag<A>,
    readonly initial: A
  ) {}

  get value() {
    return this.get((value) => value);
  }

  get<R>(reader: (value: A) => R) {
    return Effect.map(resolve(this.store, this.tag, this.initial), (slot) =>
      reader(currentCell(slot).value)
    );
  }

  set(value: A) {
    return Effect.map(resolve(this.store, this.tag, this.initial), (slot) => {
      currentCell(slot).value = value;
    });
  }

  provide: ContextHandle<A>["provide"] = dual(
    2,
    <X, E, R>(self: Effect.Effect<X, E, R>, value: A) =>
      Effect.acquireUseRelease(
        Effect.map(resolve(this.store, this.tag, this.initial), (slot) => {
          const cell: Cell<A> = { value };
          slot.overrides.push(cell);
          return { slot, cell };
        }),
        () => self,
        ({ slot, cell }) => pop(this.tag, slot, cell)
      )
  );

  toString() {
    return `ContextHandle(${format(this.tag)})`;
  }
}

/**
 * @since 1.0.0
 * @category guards
 */
export const isContextHandle = (u: unknown): u is ContextHandle<unknown> =>
  typeof u === "object" && u !== null && TypeId in u;

/**
 * Establishes the context value for `tag`. A live context keeps its current
 * value; `initial` is only used when none exists yet, or later to recreate
 * it after eviction.
 *
 * @since 1.0.0
 * @category constructors
 */
export const create = <A>(
  tag: TypeTag<A>,
  initial: A
): Effect.Effect<ContextHandle<A>, never, Store.Store> =>
  Effect.gen(function* () {
    const store = yield* Store.Store;
    yield* resolve(store, tag, initial);
    return new ContextHandleImpl(store, tag, initial);
  });

/**
 * Same as {@link create}.
 *
 * @since 1.0.0
 * @category constructors
 */
export const createContext = create;
