export * as TypeTag from "./tag";
