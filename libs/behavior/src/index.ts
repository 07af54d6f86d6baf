export * from "./adapters";
export type { Config } from "./config";
export * from "./dsl";
export * from "./handlers";
export * from "./interfaces";
export * from "./loggers";
export * from "./manager";
export * from "./port";
export * from "./ports";
export * from "./types";
export * from "./utils";
