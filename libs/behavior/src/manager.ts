import { command, load, type CommandResult } from "./handlers";
import type { Disposable } from "./interfaces";
import { log } from "./ports";
import type {
  AggregateLike,
  Behavior,
  Command,
  Messages,
  Snapshot
} from "./types";

/**
 * Aggregate managers dispatch commands to the aggregates of one behavior,
 * keeping the last snapshot of each aggregate in memory.
 *
 * Commands for the same aggregate must be submitted one at a time, a command
 * validated against a stale snapshot fails to commit with `ConcurrencyError`
 * and its events are discarded.
 */
export interface AggregateManager<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> extends Disposable {
  readonly behavior: Behavior<A, C, E>;
  submit(id: string, message: Command<C>): Promise<CommandResult<A, E>>;
  load(id: string): Promise<Snapshot<A>>;
  evict(id: string): void;
}

/**
 * Creates an aggregate manager
 * @param name the behavior name, prefix of the aggregate streams
 * @param behavior the behavior
 */
export const manager = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  name: string,
  behavior: Behavior<A, C, E>
): AggregateManager<A, C, E> => {
  const snapshots = new Map<string, Snapshot<A>>();

  const _load = async (id: string): Promise<Snapshot<A>> => {
    const cached = snapshots.get(id);
    if (cached) return cached;
    const snapshot = await load(name, behavior, id);
    snapshots.set(id, snapshot);
    return snapshot;
  };

  return {
    name: `${name}Manager`,
    behavior,

    dispose: () => {
      snapshots.clear();
      return Promise.resolve();
    },

    submit: async (id: string, message: Command<C>) => {
      const snapshot = await _load(id);
      try {
        const result = await command(name, behavior, id, message, snapshot);
        snapshots.set(id, result.snapshot);
        return result;
      } catch (error) {
        snapshots.delete(id);
        log().red().trace(`   ... ${name}-${id} evicted`);
        throw error;
      }
    },

    load: _load,

    evict: (id: string) => {
      snapshots.delete(id);
    }
  };
};
