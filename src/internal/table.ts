import type { PositionId } from "../position/position";
import { format, type TypeTag } from "../tag/tag";

/**
 * Mutable value container shared by a store entry and every handle bound to
 * it. Evicting the entry only detaches the cell from the store.
 */
export interface Cell<A> {
  value: A;
}

export interface Slot<A> {
  readonly cell: Cell<A>;
  touched: boolean;
}

export interface ContextSlot<A> {
  readonly base: Cell<A>;
  readonly overrides: Array<Cell<A>>;
  touched: boolean;
}

export interface TableSweep {
  readonly evicted: ReadonlyArray<PositionId>;
  readonly contextEvicted: boolean;
  readonly retained: number;
}

/**
 * The part of a table the store can drive without knowing its value type.
 */
export interface Sweepable {
  readonly tagKey: string;
  readonly size: number;
  sweep(): TableSweep;
  detach(owner: object): void;
}

/**
 * Every slot of one type tag inside one store: position-keyed slots plus the
 * tag's context slot, if any.
 */
export class SlotTable<A> implements Sweepable {
  readonly slots = new Map<PositionId, Slot<A>>();
  context: ContextSlot<A> | undefined = undefined;

  constructor(readonly tag: TypeTag<A>) {}

  get tagKey() {
    return format(this.tag);
  }

  get size() {
    return this.slots.size + (this.context === undefined ? 0 : 1);
  }

  sweep(): TableSweep {
    const evicted: Array<PositionId> = [];
    let contextEvicted = false;
    let retained = 0;
    for (const [position, slot] of this.slots) {
      if (slot.touched) {
        slot.touched = false;
        retained++;
      } else {
        this.slots.delete(position);
        evicted.push(position);
      }
    }
    if (this.context !== undefined) {
      if (this.context.touched) {
        this.context.touched = false;
        retained++;
      } else {
        this.context = undefined;
        contextEvicted = true;
      }
    }
    return { evicted, contextEvicted, retained };
  }

  detach(owner: object) {
    if (this.tag.tables.get(owner) === this) {
      this.tag.tables.delete(owner);
    }
  }
}

export const makeSlot = <A>(value: A): Slot<A> => ({
  cell: { value },
  touched: true,
});

export const makeContextSlot = <A>(value: A): ContextSlot<A> => ({
  base: { value },
  overrides: [],
  touched: true,
});

export const currentCell = <A>(slot: ContextSlot<A>): Cell<A> =>
  slot.overrides[slot.overrides.length - 1] ?? slot.base;
