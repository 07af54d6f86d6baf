import { log, store } from "../ports";
import type {
  AggregateLike,
  Behavior,
  CommittedEvent,
  Event,
  Messages,
  Snapshot
} from "../types";

/**
 * Names the stream of an aggregate
 * @param name the behavior name
 * @param id the aggregate id
 */
export const streamOf = (name: string, id: string): string => `${name}-${id}`;

/**
 * Folds events into a snapshot: the first event of the stream creates the
 * aggregate, the rest update it, in order.
 * @param behavior the behavior
 * @param events the events to fold
 * @param snapshot the snapshot to fold from, the empty stream by default
 * @returns the next snapshot
 * @throws `UnhandledEventError` when the first event can't create an aggregate
 */
export const replay = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  behavior: Behavior<A, C, E>,
  events: ReadonlyArray<Event<E>>,
  snapshot: Snapshot<A> = { version: -1 }
): Snapshot<A> =>
  events.reduce<Snapshot<A>>(
    ({ aggregate, version }, event) => ({
      aggregate: aggregate
        ? behavior.applyUpdate(aggregate, event)
        : behavior.applyCreation(event),
      version: version + 1
    }),
    snapshot
  );

/**
 * Loads an aggregate from the store
 * @param name the behavior name
 * @param behavior the behavior
 * @param id the aggregate id
 * @returns current snapshot
 */
export async function load<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  name: string,
  behavior: Behavior<A, C, E>,
  id: string
): Promise<Snapshot<A>> {
  const stream = streamOf(name, id);
  const events: CommittedEvent<E>[] = [];
  await store().query<E>((event) => events.push(event), { stream });
  try {
    const snapshot = replay(behavior, events);
    log()
      .dimmed()
      .gray()
      .trace(`   ... ${stream} loaded ${events.length} event(s)`);
    return snapshot;
  } catch (error) {
    log().error(error);
    throw error;
  }
}
