export * as State from "./state";
