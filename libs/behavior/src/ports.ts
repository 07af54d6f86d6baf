import { InMemoryStore } from "./adapters";
import { config as _config } from "./config";
import type { Logger, Store } from "./interfaces";
import * as loggers from "./loggers";
import { port } from "./port";

/**
 * @category Ports
 * @remarks Global port to configuration
 */
export const config = port(function config() {
  return { ..._config(), name: "config", dispose: () => Promise.resolve() };
});

/**
 * @category Ports
 * @remarks Global port to logging
 */
export const log = port(function log(logger?: Logger) {
  if (logger) return logger;
  switch (config().env) {
    case "development":
      return loggers.devLogger();
    case "test":
      return loggers.testLogger();
    default:
      return loggers.plainLogger();
  }
});

/**
 * @category Ports
 * @remarks Global port to event store
 * @example Injecting a store adapter before the first command
 ```ts
 store(InMemoryStore());
 const products = manager("Product", ProductBehavior);
 await products.submit("p-1", { name: "CreateProduct", data });
 await dispose()();
 ```
 */
export const store = port(function store(store?: Store) {
  return store || InMemoryStore();
});
