import { Brand, Context, Effect } from "effect";
import { dual } from "effect/Function";

/**
 * Identity of a point in a traversal: the path of scopes entered since the
 * traversal root. Stable across traversals that follow the same control
 * flow.
 *
 * @since 1.0.0
 * @category models
 */
export type PositionId = string & Brand.Brand<"PositionId">;

/**
 * @since 1.0.0
 * @category constructors
 */
export const PositionId = Brand.nominal<PositionId>();

/**
 * The scope a traversal is currently in. `counters` records how many times
 * each token has been entered under this scope during the traversal.
 *
 * @since 1.0.0
 * @category models
 */
export interface Position {
  readonly id: PositionId;
  readonly counters: Map<string, number>;
}

/**
 * @since 1.0.0
 * @category context
 */
export const Position = Context.GenericTag<Position>("rooted-state/position");

const segment = (part: string | number) => encodeURIComponent(String(part));

const frame = (id: PositionId): Position => ({ id, counters: new Map() });

const enter = (parent: Position, token: string): Position => {
  const index = parent.counters.get(token) ?? 0;
  parent.counters.set(token, index + 1);
  return frame(PositionId(`${parent.id}/${segment(token)}:${index}`));
};

/**
 * @since 1.0.0
 * @category getters
 */
export const current: Effect.Effect<PositionId, never, Position> = Effect.map(
  Position,
  (position) => position.id
);

/**
 * Starts a traversal. Every run gets a fresh root scope, so running the same
 * traversal again reproduces the same position ids.
 *
 * @since 1.0.0
 * @category combinators
 */
export const root: {
  (
    name?: string
  ): <A, E, R>(
    self: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, Exclude<R, Position>>;
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    name?: string
  ): Effect.Effect<A, E, Exclude<R, Position>>;
} = dual(
  (args) => Effect.isEffect(args[0]),
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    name: string = "root"
  ): Effect.Effect<A, E, Exclude<R, Position>> =>
    Effect.suspend(() =>
      Effect.provideService(self, Position, frame(PositionId(segment(name))))
    )
);

/**
 * Runs `self` one scope deeper. The new position combines the current one,
 * `token`, and how many times `token` was already entered under the current
 * scope in this traversal, so sibling calls and recursive calls never share
 * an id. The previous scope is back in place once `self` exits, however it
 * exits.
 *
 * @since 1.0.0
 * @category combinators
 */
export const nested: {
  (
    token: string
  ): <A, E, R>(
    self: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R | Position>;
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    token: string
  ): Effect.Effect<A, E, R | Position>;
} = dual(
  2,
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    token: string
  ): Effect.Effect<A, E, R | Position> =>
    Effect.flatMap(Position, (parent) =>
      Effect.provideService(self, Position, enter(parent, token))
    )
);

/**
 * Like {@link nested}, but identified by an explicit `key` instead of call
 * order. Keys are compared by their string form; entering the same token and
 * key twice under one scope yields the same position.
 *
 * @since 1.0.0
 * @category combinators
 */
export const keyed: {
  (
    token: string,
    key: string | number
  ): <A, E, R>(
    self: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R | Position>;
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    token: string,
    key: string | number
  ): Effect.Effect<A, E, R | Position>;
} = dual(
  3,
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    token: string,
    key: string | number
  ): Effect.Effect<A, E, R | Position> =>
    Effect.flatMap(Position, (parent) =>
      Effect.provideService(
        self,
        Position,
        frame(PositionId(`${parent.id}/${segment(token)}[${segment(key)}]`))
      )
    )
);
