export * as Position from "./position";
