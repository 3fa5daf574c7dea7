import { Effect } from "effect";
import { Position } from "../position";
import { Store } from "../store";

/**
 * One store shared by every traversal a test runs, the way a host keeps it
 * between cycles.
 */
export const makeHarness = (options?: Store.StoreOptions) => {
  const store = Effect.runSync(Store.make(options));
  const provide = Effect.provideService(Store.Store, store);

  return {
    store,
    run: <A>(
      traversal: Effect.Effect<A, never, Store.Store | Position.Position>
    ) => Effect.runSync(traversal.pipe(Position.root(), provide)),
    sweep: () => Effect.runSync(Store.sweep.pipe(provide)),
    size: () => Effect.runSync(Store.size.pipe(provide)),
  };
};
