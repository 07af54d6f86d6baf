export * from "./InMemoryStore";
