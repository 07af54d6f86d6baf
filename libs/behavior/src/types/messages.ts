/**
 * Message maps name the payload of each message
 * @example
 ```ts
 type ProductCommands = {
   CreateProduct: { id: string; name: string; price: number };
   ChangePrice: { price: number };
 };
 ```
 */
export type Messages = Record<string, object>;

/**
 * Messages have
 * - `name` a name
 * - `data` a payload
 */
export type Message<
  M extends Messages = Messages,
  N extends keyof M & string = keyof M & string
> = {
  readonly name: N;
  readonly data: Readonly<M[N]>;
};

/**
 * Any message, regardless of its map
 */
export type MessageLike = {
  readonly name: string;
  readonly data: unknown;
};

/**
 * Discriminated union of all messages in a map, narrowing `data` by `name`
 */
export type Union<M extends Messages> = {
  [N in keyof M & string]: Message<M, N>;
}[keyof M & string];

/** Commands are requests to change aggregate state, and can be rejected */
export type Command<C extends Messages = Messages> = Union<C>;

/** Events are immutable facts recording accepted state changes */
export type Event<E extends Messages = Messages> = Union<E>;

/**
 * Aggregates are immutable snapshots of domain state identified by `id`
 */
export type AggregateLike = { readonly id: string };

/**
 * Commit details
 * - `id` the unique index of the event in the "all" stream
 * - `stream` the stream of the aggregate that produced the event
 * - `version` the unique and continuous sequence number within the stream
 * - `created` the date-time of creation
 */
export type Commit = {
  readonly id: number;
  readonly stream: string;
  readonly version: number;
  readonly created: Date;
};

/** Committed events are events with commit details */
export type CommittedEvent<E extends Messages = Messages> = Event<E> & Commit;

/**
 * Snapshots hold the folded aggregate and the version of the last event folded
 * - `aggregate?` the current aggregate, undefined before creation
 * - `version` the version of the last folded event, -1 when the stream is empty
 */
export type Snapshot<A extends AggregateLike = AggregateLike> = {
  readonly aggregate?: A;
  readonly version: number;
};

/**
 * Options to query the all stream
 * - `stream?` filter by stream
 * - `after?` filter events after this id
 * - `limit?` limit the number of events to return
 */
export type AllQuery = {
  readonly stream?: string;
  readonly after?: number;
  readonly limit?: number;
};
