import type {
  AllQuery,
  CommittedEvent,
  Event,
  Messages
} from "../types";
import type { Disposable } from "./generic";

/**
 * Stores are append-only logs of committed events, partitioned in streams
 */
export interface Store extends Disposable {
  /**
   * Queries the all stream
   * @param callback callback invoked with each event, in commit order
   * @param query optional filters
   * @returns number of events found
   */
  query: <E extends Messages>(
    callback: (event: CommittedEvent<E>) => void,
    query?: AllQuery
  ) => Promise<number>;

  /**
   * Commits events to a stream
   * @param stream the stream name
   * @param events the events to commit, in order
   * @param expectedVersion the version of the last event in the stream, -1 when empty
   * @returns the committed events with their new versions
   * @throws `ConcurrencyError` when the stream moved past `expectedVersion`
   */
  commit: <E extends Messages>(
    stream: string,
    events: Event<E>[],
    expectedVersion?: number
  ) => Promise<CommittedEvent<E>[]>;

  /**
   * Removes all events, for tests
   */
  reset: () => Promise<void>;
}
