import type { Disposable, Disposer } from "./interfaces";

/**
 * Ports own one adapter at a time, created on first use and released by `dispose()`
 */
type Registration = {
  readonly name: string;
  readonly release: Disposer;
};

const registrations: Registration[] = [];
const disposers: Disposer[] = [];

/**
 * Declares a port around an adapter factory.
 *
 * The first call creates the adapter, passing the optional adapter to the
 * factory so callers can inject their own. Later calls return the same adapter
 * until it is released by `dispose()`.
 *
 * @param factory creates the default adapter, or returns the injected one
 */
export const port = <T extends Disposable>(factory: (adapter?: T) => T) => {
  let current: T | undefined;
  return (adapter?: T): T => {
    if (current) return current;
    const created = factory(adapter);
    current = created;
    registrations.push({
      name: created.name || factory.name,
      release: async () => {
        current = undefined;
        await created.dispose();
      }
    });
    return created;
  };
};

const disposeAll = async (): Promise<void> => {
  await Promise.all(disposers.splice(0).map((disposer) => disposer()));
  // adapters can depend on the ones created before them
  for (const { release } of registrations.splice(0).reverse()) await release();
};

/**
 * Registers a resource disposer, run before the adapters are released
 * @param disposer the optional disposer
 * @returns a function that runs the registered disposers and releases every adapter
 */
export const dispose = (disposer?: Disposer): (() => Promise<void>) => {
  disposer && disposers.push(disposer);
  return disposeAll;
};
