import type { SlotTable } from "../internal/table";

/**
 * @since 1.0.0
 * @category type ids
 */
export const TypeId: unique symbol = Symbol.for("rooted-state/tag");

/**
 * @since 1.0.0
 * @category type ids
 */
export type TypeId = typeof TypeId;

/**
 * Identity of a stored value's type. Two slots rooted at the same position
 * with different tags never share storage.
 *
 * Tags are meant to be created once, at module scope, and reused: every call
 * to {@link make} yields a distinct tag even for the same key.
 *
 * @since 1.0.0
 * @category models
 */
export interface TypeTag<A> {
  readonly [TypeId]: TypeId;
  readonly key: string;
  readonly id: number;
  /** @internal */
  readonly tables: WeakMap<object, SlotTable<A>>;
}

let nextId = 0;

/**
 * @since 1.0.0
 * @category constructors
 */
export const make = <A>(key: string): TypeTag<A> => {
  const tag: TypeTag<A> = {
    [TypeId]: TypeId,
    key,
    id: nextId++,
    tables: new WeakMap(),
  };
  return tag;
};

/**
 * @since 1.0.0
 * @category guards
 */
export const isTypeTag = (u: unknown): u is TypeTag<unknown> =>
  typeof u === "object" && u !== null && TypeId in u;

export const format = <A>(tag: TypeTag<A>) => `${tag.key}#${tag.id}`;
