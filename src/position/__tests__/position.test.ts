import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { Position } from "..";

const traverse = <A, E>(effect: Effect.Effect<A, E, Position.Position>) =>
  Effect.runSync(Position.root(effect));

describe("Position", () => {
  it("starts every traversal at the root", () => {
    expect(traverse(Position.current)).toBe("root");
    expect(Effect.runSync(Position.root(Position.current, "frame"))).toBe(
      "frame"
    );
    expect(
      Effect.runSync(Position.current.pipe(Position.root("frame")))
    ).toBe("frame");
  });

  it("gives sibling scopes with the same token distinct ids", () => {
    const ids = traverse(
      Effect.all([
        Position.nested(Position.current, "item"),
        Position.nested(Position.current, "item"),
        Position.nested(Position.current, "other"),
      ])
    );

    expect(ids).toEqual(["root/item:0", "root/item:1", "root/other:0"]);
  });

  it("gives each recursion depth its own id", () => {
    const depth = (n: number): Effect.Effect<string, never, Position.Position> =>
      n === 0
        ? Position.current
        : depth(n - 1).pipe(Position.nested("node"));

    expect(traverse(depth(3))).toBe("root/node:0/node:0/node:0");
  });

  it("reproduces the same ids on every traversal", () => {
    const program = Effect.all([
      Position.nested(Position.current, "a"),
      Position.current.pipe(Position.nested("b"), Position.nested("a")),
    ]);

    const first = traverse(program);
    const second = traverse(program);

    expect(first).toEqual(["root/a:0", "root/a:1/b:0"]);
    expect(second).toEqual(first);
  });

  it("identifies keyed scopes by key instead of order", () => {
    const ids = traverse(
      Effect.all([
        Position.keyed(Position.current, "row", 7),
        Position.keyed(Position.current, "row", "x"),
        Position.current.pipe(Position.keyed("row", 7)),
      ])
    );

    expect(ids).toEqual(["root/row[7]", "root/row[x]", "root/row[7]"]);
  });

  it("escapes separators inside tokens", () => {
    expect(traverse(Position.nested(Position.current, "a/b:c"))).toBe(
      "root/a%2Fb%3Ac:0"
    );
  });

  it("restores the enclosing scope when the nested effect fails", () => {
    const ids = traverse(
      Effect.gen(function* () {
        const failed = yield* Effect.either(
          Position.nested(Effect.fail("boom"), "a")
        );
        const here = yield* Position.current;
        const next = yield* Position.nested(Position.current, "a");
        return { failed, here, next };
      })
    );

    expect(Either.isLeft(ids.failed) ? ids.failed.left : undefined).toBe(
      "boom"
    );
    expect(ids.here).toBe("root");
    expect(ids.next).toBe("root/a:1");
  });
});
