export * from "./command";
export * from "./load";
