export * as ContextState from "./context";
