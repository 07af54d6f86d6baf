export * from "./behavior";
export * from "./enums";
export * from "./errors";
export * from "./messages";
export * from "./rules";
