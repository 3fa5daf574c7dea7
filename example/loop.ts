import { Effect, ManagedRuntime } from "effect";
import {
  ContextState,
  Position,
  State,
  Store,
  Sweep,
  TypeTag,
} from "@/index";

const Health = TypeTag.make<number>("health");
const Gravity = TypeTag.make<number>("gravity");

const entity = (name: string) =>
  Effect.gen(function* () {
    const health = yield* State.root(Health, () => 100);
    const gravity = yield* ContextState.create(Gravity, 10);
    const pull = yield* gravity.value;
    yield* health.update((hp) => Math.max(0, hp - pull));
    yield* Effect.log(`${name}: ${yield* health.value}`);
  }).pipe(Position.keyed("entity", name));

const frame = (names: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const gravity = yield* ContextState.create(Gravity, 10);
    for (const name of names) {
      yield* name === "astronaut"
        ? entity(name).pipe(gravity.provide(2))
        : entity(name);
    }
  });

const runtime = ManagedRuntime.make(Store.layerConfig);

const frames = [
  ["knight", "archer", "astronaut"],
  ["knight", "astronaut"],
  ["knight", "archer"],
];

for (const names of frames) {
  const [, stats] = runtime.runSync(frame(names).pipe(Sweep.cycle()));
  runtime.runSync(
    Effect.log("frame done").pipe(Effect.annotateLogs({ ...stats }))
  );
}

await runtime.dispose();
