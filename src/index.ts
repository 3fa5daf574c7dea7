export * from "./context";
export * from "./errors";
export * from "./position";
export * from "./state";
export * from "./store";
export * from "./sweep";
export * from "./tag";
