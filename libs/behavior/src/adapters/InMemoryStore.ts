import type { Store } from "../interfaces";
import {
  ConcurrencyError,
  type AllQuery,
  type Commit,
  type CommittedEvent,
  type Event,
  type MessageLike,
  type Messages
} from "../types";

/**
 * @category Adapters
 * @remarks In-memory event store
 */
export const InMemoryStore = (): Store => {
  const _events: Array<MessageLike & Commit> = [];

  return {
    name: "InMemoryStore",

    dispose: () => {
      _events.length = 0;
      return Promise.resolve();
    },

    query: <E extends Messages>(
      callback: (event: CommittedEvent<E>) => void,
      query?: AllQuery
    ): Promise<number> => {
      const { stream, after = -1, limit } = query || {};
      let i = after + 1,
        count = 0;
      while (i < _events.length) {
        const e = _events[i++];
        if (stream && e.stream !== stream) continue;
        callback(e as CommittedEvent<E>);
        count++;
        if (limit && count >= limit) break;
      }
      return Promise.resolve(count);
    },

    commit: <E extends Messages>(
      stream: string,
      events: Event<E>[],
      expectedVersion?: number
    ): Promise<CommittedEvent<E>[]> => {
      const lastVersion = _events.filter((e) => e.stream === stream).length - 1;
      if (expectedVersion !== undefined && lastVersion !== expectedVersion)
        return Promise.reject(
          new ConcurrencyError(lastVersion, events, expectedVersion)
        );

      let version = lastVersion + 1;
      const committed = events.map((event) => {
        const committed: CommittedEvent<E> = {
          ...event,
          id: _events.length,
          stream,
          version: version++,
          created: new Date()
        };
        _events.push(committed);
        return committed;
      });
      return Promise.resolve(committed);
    },

    reset: (): Promise<void> => {
      _events.length = 0;
      return Promise.resolve();
    }
  };
};
