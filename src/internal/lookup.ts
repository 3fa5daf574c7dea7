import { Effect } from "effect";
import { StoreInvariantError } from "../errors";
import type { Store } from "../store/store";
import { format, type TypeTag } from "../tag/tag";
import { SlotTable } from "./table";

export const annotate = (store: Store) =>
  Effect.annotateLogs({ store: store.label });

/**
 * Returns the table holding `tag`'s slots in `store`, creating and
 * registering it on first use. Dies if the store and the tag disagree about
 * which table that is.
 */
export const tableFor = <A>(
  store: Store,
  tag: TypeTag<A>
): Effect.Effect<SlotTable<A>> =>
  Effect.suspend(() => {
    const owned = tag.tables.get(store);
    const registered = store.tables.get(tag.id);
    if (owned !== undefined) {
      if (registered !== owned) {
        return Effect.die(
          new StoreInvariantError({
            message: `table for ${format(tag)} is not registered in store ${store.label}`,
          })
        );
      }
      return Effect.succeed(owned);
    }
    if (registered !== undefined) {
      return Effect.die(
        new StoreInvariantError({
          message: `store ${store.label} holds a table for ${format(tag)} that the tag does not own`,
        })
      );
    }
    const created = new SlotTable(tag);
    tag.tables.set(store, created);
    store.tables.set(tag.id, created);
    return Effect.succeed(created);
  });
