export * from "./behavior";
export * from "./builder";
export * from "./creation";
export * from "./outcome";
export * from "./rules";
export * from "./updates";
