import type { CommandRejection } from "./errors";
import type { AggregateLike, Command, Event, Messages } from "./messages";

/**
 * Outcome of command validation, either accepted with a value or rejected
 */
export type Validation<T> =
  | { readonly status: "accepted"; readonly value: T }
  | { readonly status: "rejected"; readonly rejection: CommandRejection };

export const accepted = <T>(value: T): Validation<T> => ({
  status: "accepted",
  value
});

export const rejected = <T>(rejection: CommandRejection): Validation<T> => ({
  status: "rejected",
  rejection
});

export const isAccepted = <T>(
  validation: Validation<T>
): validation is { readonly status: "accepted"; readonly value: T } =>
  validation.status === "accepted";

export const isRejected = <T>(
  validation: Validation<T>
): validation is {
  readonly status: "rejected";
  readonly rejection: CommandRejection;
} => validation.status === "rejected";

/**
 * Behaviors are immutable rule tables defining how one kind of aggregate
 * validates commands and folds events, shared by all its instances.
 *
 * - Command validation never throws: unmatched commands and failed actions
 *   resolve to rejections.
 * - `applyCreation` throws `UnhandledEventError` when no creation fold
 *   matches, since that means the history doesn't belong to this behavior.
 * - `applyUpdate` returns the aggregate unchanged when no update fold
 *   matches, so older aggregates replay after the event schema evolves.
 */
export interface Behavior<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> {
  readonly name: string;
  validateCreation(command: Command<C>): Promise<Validation<Event<E>>>;
  validateUpdate(
    command: Command<C>,
    aggregate: A
  ): Promise<Validation<Event<E>[]>>;
  applyCreation(event: Event<E>): A;
  applyUpdate(aggregate: A, event: Event<E>): A;
  isCreationEventDefined(event: Event<E>): boolean;
  isUpdateEventDefined(aggregate: A, event: Event<E>): boolean;
}
