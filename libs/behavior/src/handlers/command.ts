import { log, store } from "../ports";
import {
  accepted,
  CommandRejection,
  Errors,
  isRejected,
  rejected,
  type AggregateLike,
  type Behavior,
  type Command,
  type CommittedEvent,
  type Event,
  type Messages,
  type Snapshot,
  type Validation
} from "../types";
import { load, replay, streamOf } from "./load";

/**
 * Command handling results
 * - `validation` the accepted events or the rejection
 * - `snapshot` the snapshot after folding the committed events
 * - `events` the committed events, empty when rejected
 */
export type CommandResult<A extends AggregateLike, E extends Messages> = {
  readonly validation: Validation<Event<E>[]>;
  readonly snapshot: Snapshot<A>;
  readonly events: CommittedEvent<E>[];
};

/**
 * Accepts creation events only when they create the aggregate of the stream
 */
const created = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  behavior: Behavior<A, C, E>,
  id: string,
  message: Command<C>,
  validation: Validation<Event<E>>
): Validation<Event<E>[]> => {
  if (isRejected(validation)) return validation;
  const aggregate = behavior.applyCreation(validation.value);
  return aggregate.id === id
    ? accepted([validation.value])
    : rejected<Event<E>[]>(
        new CommandRejection(
          Errors.AggregateMismatch,
          `Command ${message.name} creates aggregate ${aggregate.id} instead of ${id}`,
          message,
          id
        )
      );
};

/**
 * Validates a command against the current snapshot, commits the accepted
 * events and folds them in commit order
 * @param name the behavior name
 * @param behavior the behavior
 * @param id the aggregate id
 * @param message the command
 * @param snapshot the current snapshot, loaded from the store when missing
 * @returns the command result
 * @throws `ConcurrencyError` when the snapshot is stale
 */
export async function command<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  name: string,
  behavior: Behavior<A, C, E>,
  id: string,
  message: Command<C>,
  snapshot?: Snapshot<A>
): Promise<CommandResult<A, E>> {
  const stream = streamOf(name, id);
  const current = snapshot ?? (await load(name, behavior, id));
  log().bold().blue().trace(`\n>>> ${stream}`, message);

  const validation = current.aggregate
    ? await behavior.validateUpdate(message, current.aggregate)
    : created(behavior, id, message, await behavior.validateCreation(message));

  if (isRejected(validation)) {
    log()
      .yellow()
      .data(`<<< ${stream} ${validation.rejection.name}`, {
        reason: validation.rejection.message
      });
    return { validation, snapshot: current, events: [] };
  }

  const events = await store().commit<E>(
    stream,
    validation.value,
    current.version
  );
  log()
    .magenta()
    .data(
      `<<< ${stream} committed ${events
        .map((e) => `${e.name}@${e.version}`)
        .join(",")}`
    )
    .events(events);
  return { validation, snapshot: replay(behavior, events, current), events };
}
