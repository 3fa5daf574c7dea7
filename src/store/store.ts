import { Context, Effect, Layer, LogLevel } from "effect";
import { annotate } from "../internal/lookup";
import type { Sweepable } from "../internal/table";
import { StoreConfig } from "./config";

/**
 * Registry of every rooted slot and context slot, grouped into one table per
 * type tag. A store is created explicitly and lives as long as the host keeps
 * it in context; nothing here is global.
 *
 * @since 1.0.0
 * @category models
 */
export interface Store {
  readonly label: string;
  readonly sweepLogLevel: LogLevel.LogLevel;
  readonly tables: Map<number, Sweepable>;
}

/**
 * @since 1.0.0
 * @category context
 */
export const Store = Context.GenericTag<Store>("rooted-state/store");

export interface StoreOptions {
  readonly label?: string;
  readonly sweepLogLevel?: LogLevel.LogLevel;
}

/**
 * @since 1.0.0
 * @category constructors
 */
export const make = (options: StoreOptions = {}) =>
  Effect.sync(
    (): Store => ({
      label: options.label ?? "default",
      sweepLogLevel: options.sweepLogLevel ?? LogLevel.Debug,
      tables: new Map(),
    })
  );

/**
 * @since 1.0.0
 * @category layers
 */
export const layer = (options?: StoreOptions) =>
  Layer.effect(Store, make(options));

/**
 * Builds the store from `ROOTED_STATE_*` configuration.
 *
 * @since 1.0.0
 * @category layers
 */
export const layerConfig = Layer.effect(
  Store,
  Effect.flatMap(StoreConfig, (options) => make(options))
);

/**
 * @since 1.0.0
 * @category models
 */
export interface SweepStats {
  readonly evicted: number;
  readonly retained: number;
}

/**
 * Evicts every slot that was not touched since the previous sweep and resets
 * the touched flag of the survivors. The pass over the tables runs to
 * completion before anything is logged.
 *
 * @since 1.0.0
 * @category sweep
 */
export const sweep: Effect.Effect<SweepStats, never, Store> = Effect.gen(
  function* () {
    const store = yield* Store;
    const evictions: Array<
      { tag: string; position: string } | { tag: string; kind: "context" }
    > = [];
    let retained = 0;
    for (const [id, entry] of store.tables) {
      const result = entry.sweep();
      retained += result.retained;
      for (const position of result.evicted) {
        evictions.push({ tag: entry.tagKey, position });
      }
      if (result.contextEvicted) {
        evictions.push({ tag: entry.tagKey, kind: "context" });
      }
      if (entry.size === 0) {
        store.tables.delete(id);
        entry.detach(store);
      }
    }

    const stats: SweepStats = { evicted: evictions.length, retained };
    yield* Effect.gen(function* () {
      for (const eviction of evictions) {
        yield* Effect.logDebug("slot evicted").pipe(
          Effect.annotateLogs(eviction)
        );
      }
      yield* Effect.logWithLevel(store.sweepLogLevel, "sweep").pipe(
        Effect.annotateLogs({ evicted: stats.evicted, retained })
      );
    }).pipe(annotate(store));
    return stats;
  }
).pipe(Effect.withSpan("store:sweep"));

/**
 * Number of live slots, position-keyed and context slots together.
 *
 * @since 1.0.0
 * @category getters
 */
export const size: Effect.Effect<number, never, Store> = Effect.map(
  Store,
  (store) => {
    let total = 0;
    for (const entry of store.tables.values()) {
      total += entry.size;
    }
    return total;
  }
);
