export * from "./generic";
export * from "./logger";
export * from "./store";
