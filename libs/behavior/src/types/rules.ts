import type { AggregateLike, Command, Event, Messages } from "./messages";

/**
 * What creation actions can yield, all normalized to a promised event
 * - an event
 * - an `Error` to fail immediately
 * - a promise of an event
 * - a fallible computation of an event (a thunk that may throw)
 */
export type CreationYield<E extends Messages> =
  | Event<E>
  | Error
  | Promise<Event<E>>
  | (() => Event<E>);

/**
 * What update actions can yield, all normalized to a promised list of events
 * - an event or a list of events
 * - an `Error` to fail immediately
 * - a promise of an event or a list of events
 * - a fallible computation of an event or a list of events
 */
export type UpdateYield<E extends Messages> =
  | Event<E>
  | Event<E>[]
  | Error
  | Promise<Event<E> | Event<E>[]>
  | (() => Event<E> | Event<E>[]);

/**
 * Rules are partial functions: they return the deferred action when the input
 * matches their pattern, or `undefined` when it doesn't. Actions run only when
 * invoked, so rules can be probed without side effects.
 */
export type Rule<I extends unknown[], O> = (...input: I) => (() => O) | undefined;

/** Creation command rules map commands to a single event */
export type CreationCommandRule<
  C extends Messages,
  E extends Messages
> = Rule<[command: Command<C>], CreationYield<E>>;

/** Creation event rules fold the first event into a new aggregate */
export type CreationEventRule<
  A extends AggregateLike,
  E extends Messages
> = Rule<[event: Event<E>], A>;

/** Update command rules map commands and the current aggregate to events */
export type UpdateCommandRule<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> = Rule<[command: Command<C>, aggregate: A], UpdateYield<E>>;

/** Update event rules fold events into the next aggregate */
export type UpdateEventRule<
  A extends AggregateLike,
  E extends Messages
> = Rule<[aggregate: A, event: Event<E>], A>;
