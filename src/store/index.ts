export * as Store from "./store";
export * as StoreConfig from "./config";
