import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";
import { Position } from "../../position";
import { TypeTag } from "../../tag";
import { makeHarness } from "../../test-utils/harness";
import { State } from "..";

const Count = TypeTag.make<number>("count");
const Label = TypeTag.make<string>("label");

describe("State.root", () => {
  it("keeps the first value when the position is rooted again", () => {
    const { run } = makeHarness();

    const first = run(
      Effect.flatMap(State.root(Count, () => 42), (h) => h.value)
    );
    const second = run(
      Effect.flatMap(State.root(Count, () => 500), (h) => h.value)
    );

    expect(first).toBe(42);
    expect(second).toBe(42);
  });

  it("runs the initializer once per slot lifetime", () => {
    const { run } = makeHarness();
    const init = vi.fn(() => 1);

    run(State.root(Count, init));
    run(State.root(Count, init));
    run(State.useState(Count, init));

    expect(init).toHaveBeenCalledTimes(1);
  });

  it("binds the handle to the current position and tag", () => {
    const { run } = makeHarness();

    const handle = run(State.root(Count, () => 0).pipe(Position.nested("a")));

    expect(handle.position).toBe("root/a:0");
    expect(handle.tag).toBe(Count);
    expect(State.isStateHandle(handle)).toBe(true);
    expect(String(handle)).toBe(
      `StateHandle(root/a:0, ${TypeTag.format(Count)})`
    );
  });

  it("keeps separate values for separate positions", () => {
    const { run } = makeHarness();

    const values = run(
      Effect.gen(function* () {
        const a = yield* State.root(Count, () => 1).pipe(Position.nested("a"));
        const b = yield* State.root(Count, () => 2).pipe(Position.nested("b"));
        yield* a.set(10);
        return [yield* a.value, yield* b.value];
      })
    );

    expect(values).toEqual([10, 2]);
  });

  it("keeps separate values for separate tags at one position", () => {
    const { run, size } = makeHarness();

    const values = run(
      Effect.gen(function* () {
        const count = yield* State.root(Count, () => 7);
        const label = yield* State.root(Label, () => "seven");
        return [yield* count.value, yield* label.value] as const;
      })
    );

    expect(values).toEqual([7, "seven"]);
    expect(size()).toBe(2);
  });

  it("keeps a slot alive when it is only rooted again", () => {
    const { run, sweep } = makeHarness();

    run(
      Effect.flatMap(State.root(Count, () => 1), (h) => h.update((n) => n + 1))
    );
    sweep();
    run(State.root(Count, () => 100));

    expect(sweep()).toEqual({ evicted: 0, retained: 1 });
    const value = run(
      Effect.flatMap(State.root(Count, () => 100), (h) => h.value)
    );
    expect(value).toBe(2);
  });

  it("does not treat re-rooting with a new initializer as an update", () => {
    const { run } = makeHarness();

    run(
      Effect.flatMap(State.root(Count, () => 0), (h) => h.update((n) => n + 5))
    );
    const value = run(
      Effect.flatMap(State.root(Count, () => 99), (h) => h.value)
    );

    expect(value).toBe(5);
  });
});

describe("StateHandle", () => {
  it("projects the value through get", () => {
    const { run } = makeHarness();

    const length = run(
      Effect.flatMap(State.root(Label, () => "abcd"), (h) =>
        h.get((s) => s.length)
      )
    );

    expect(length).toBe(4);
  });

  it("mutates objects in place and returns the mutator's result", () => {
    const { run } = makeHarness();
    const Items = TypeTag.make<Array<string>>("items");

    const result = run(
      Effect.gen(function* () {
        const items = yield* State.root(Items, (): Array<string> => []);
        const length = yield* items.mutate((list) => list.push("x", "y"));
        return { length, items: yield* items.value };
      })
    );

    expect(result).toEqual({ length: 2, items: ["x", "y"] });
  });

  it("keeps state alive across sweeps while it is touched", () => {
    const { run, sweep } = makeHarness();

    const handle = run(State.root(Count, () => 42));
    expect(Effect.runSync(handle.value)).toBe(42);
    sweep();
    expect(Effect.runSync(handle.value)).toBe(42);
    sweep();
    sweep();

    const value = run(
      Effect.flatMap(State.root(Count, () => 500), (h) => h.value)
    );
    expect(value).toBe(500);
  });

  const accesses: Array<
    [string, (h: State.StateHandle<number>) => Effect.Effect<unknown>]
  > = [
    ["get", (h) => h.get((n) => n)],
    ["set", (h) => h.set(3)],
    ["update", (h) => h.update((n) => n + 1)],
    ["mutate", (h) => h.mutate(() => undefined)],
  ];

  it.each(accesses)("survives a sweep after %s", (_, access) => {
    const { run, sweep, size } = makeHarness();

    const handle = run(State.root(Count, () => 0));
    sweep();
    Effect.runSync(access(handle));
    const stats = sweep();

    expect(stats).toEqual({ evicted: 0, retained: 1 });
    expect(size()).toBe(1);
  });

  it("stays usable after its slot was evicted", () => {
    const { run, sweep } = makeHarness();
    const Box = TypeTag.make<{ n: number }>("box");

    const handle = run(State.root(Box, () => ({ n: 1 })));
    sweep();
    sweep();

    Effect.runSync(
      handle.mutate((box) => {
        box.n = 5;
      })
    );
    expect(Effect.runSync(handle.value)).toEqual({ n: 5 });

    const fresh = run(
      Effect.flatMap(State.root(Box, () => ({ n: 1 })), (h) => h.value)
    );
    expect(fresh).toEqual({ n: 1 });
  });
});
