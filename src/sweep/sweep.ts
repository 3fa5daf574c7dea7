import { Effect } from "effect";
import { dual } from "effect/Function";
import { Position } from "../position";
import { Store } from "../store";

/**
 * Runs one traversal from a fresh root scope and sweeps the store right
 * after it, returning the traversal's result with the sweep statistics.
 *
 * @since 1.0.0
 * @category combinators
 */
export const cycle: {
  (
    name?: string
  ): <A, E, R>(
    self: Effect.Effect<A, E, R>
  ) => Effect.Effect<
    readonly [A, Store.SweepStats],
    E,
    Exclude<R, Position.Position> | Store.Store
  >;
  <A, E, R>(
    self: Effect.Effect<A, E, R>,
    name?: string
  ): Effect.Effect<
    readonly [A, Store.SweepStats],
    E,
    Exclude<R, Position.Position> | Store.Store
  >;
} = dual(
  (args) => Effect.isEffect(args[0]),
  <A, E, R>(self: Effect.Effect<A, E, R>, name?: string) =>
    Effect.gen(function* () {
      const result = yield* Position.root(self, name);
      const stats = yield* Store.sweep;
      return [result, stats] as const;
    }).pipe(Effect.withSpan("store:cycle"))
);
