import { Effect } from "effect";
import type { LazyArg } from "effect/Function";
import { annotate, tableFor } from "../internal/lookup";
import { makeSlot, type Slot } from "../internal/table";
import { Position } from "../position";
import type { PositionId } from "../position/position";
import { Store } from "../store";
import { format, type TypeTag } from "../tag/tag";

/**
 * @since 1.0.0
 * @category type ids
 */
export const TypeId: unique symbol = Symbol.for("rooted-state/state");

/**
 * @since 1.0.0
 * @category type ids
 */
export type TypeId = typeof TypeId;

/**
 * Access to one rooted slot. Every operation marks the slot as touched for
 * the current sweep window.
 *
 * The handle shares the value cell with the store, so it keeps working after
 * the slot has been evicted; from then on it reads and writes a cell the
 * store no longer knows about.
 *
 * @since 1.0.0
 * @category models
 */
export interface StateHandle<A> {
  readonly [TypeId]: TypeId;
  readonly tag: TypeTag<A>;
  readonly position: PositionId;
  readonly value: Effect.Effect<A>;
  get<R>(reader: (value: A) => R): Effect.Effect<R>;
  set(value: A): Effect.Effect<void>;
  update(f: (value: A) => A): Effect.Effect<void>;
  /**
   * Hands the stored value to `mutator` for in-place changes. Values that
   * cannot be changed in place (numbers, strings) go through `set` or
   * `update` instead.
   */
  mutate<R>(mutator: (value: A) => R): Effect.Effect<R>;
}

class StateHandleImpl<A> implements StateHandle<A> {
  readonly [TypeId]: TypeId = TypeId;

  constructor(
    readonly tag: TypeTag<A>,
    readonly position: PositionId,
    private readonly slot: Slot<A>
  ) {}

  get value() {
    return this.get((value) => value);
  }

  get<R>(reader: (value: A) => R) {
    return Effect.sync(() => {
      this.slot.touched = true;
      return reader(this.slot.cell.value);
    });
  }

  set(value: A) {
    return Effect.sync(() => {
      this.slot.touched = true;
      this.slot.cell.value = value;
    });
  }

  update(f: (value: A) => A) {
    return Effect.sync(() => {
      this.slot.touched = true;
      this.slot.cell.value = f(this.slot.cell.value);
    });
  }

  mutate<R>(mutator: (value: A) => R) {
    return Effect.sync(() => {
      this.slot.touched = true;
      return mutator(this.slot.cell.value);
    });
  }

  toString() {
    return `StateHandle(${this.position}, ${format(this.tag)})`;
  }
}

/**
 * @since 1.0.0
 * @category guards
 */
export const isStateHandle = (u: unknown): u is StateHandle<unknown> =>
  typeof u === "object" && u !== null && TypeId in u;

/**
 * Binds state of type `tag` to the current position. The first visit runs
 * `initializer` and stores its result; later visits reuse the stored value
 * without calling `initializer` again. Either way the visit counts as an
 * access, so a position that is rooted once per cycle keeps its state alive
 * without reading it.
 *
 * Rooting again with a different initializer does not change a live value;
 * use the handle's `set`, `update` or `mutate` for that.
 *
 * @since 1.0.0
 * @category constructors
 */
export const root = <A>(
  tag: TypeTag<A>,
  initializer: LazyArg<A>
): Effect.Effect<StateHandle<A>, never, Store.Store | Position.Position> =>
  Effect.gen(function* () {
    const store = yield* Store.Store;
    const position = yield* Position.current;
    const table = yield* tableFor(store, tag);

    const existing = table.slots.get(position);
    if (existing !== undefined) {
      existing.touched = true;
      return new StateHandleImpl(tag, position, existing);
    }

    const slot = makeSlot(yield* Effect.sync(initializer));
    table.slots.set(position, slot);
    yield* Effect.logDebug("slot rooted").pipe(
      Effect.annotateLogs({ tag: format(tag), position }),
      annotate(store)
    );
    return new StateHandleImpl(tag, position, slot);
  }).pipe(Effect.withSpan("state:root"));

/**
 * Hook-style name for {@link root}.
 *
 * @since 1.0.0
 * @category constructors
 */
export const useState = root;
