import type {
  AggregateLike,
  Command,
  Event,
  Message,
  Messages,
  UpdateCommandRule,
  UpdateEventRule,
  UpdateYield
} from "../types";
import { is } from "./rules";

type Guard<
  A extends AggregateLike,
  C extends Messages,
  K extends keyof C & string
> = (command: Message<C, K>, aggregate: A) => boolean;

type Action<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages,
  K extends keyof C & string
> = (command: Message<C, K>, aggregate: A) => UpdateYield<E>;

/**
 * Accumulates the rules that apply once the aggregate exists
 * - command rules validate commands against the aggregate and yield events
 * - event rules fold events into the next aggregate
 *
 * Like `CreationBuilder`, every registration returns a new builder.
 */
export class UpdatesBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> {
  constructor(
    readonly commands: ReadonlyArray<UpdateCommandRule<A, C, E>> = [],
    readonly events: ReadonlyArray<UpdateEventRule<A, E>> = []
  ) {}

  processCommands(
    ...rules: UpdateCommandRule<A, C, E>[]
  ): UpdatesBuilder<A, C, E> {
    return new UpdatesBuilder(this.commands.concat(rules), this.events);
  }

  handleEvents(...rules: UpdateEventRule<A, E>[]): UpdatesBuilder<A, C, E> {
    return new UpdatesBuilder(this.commands, this.events.concat(rules));
  }

  /**
   * Handles commands by name, optionally guarded by the command and aggregate
   * @example
   ```ts
   it.on(
     "ChangePrice",
     ({ data }) => data.price > 0,
     ({ data }) => ({ name: "PriceChanged", data })
   );
   ```
   */
  on<K extends keyof C & string>(
    name: K,
    action: Action<A, C, E, K>
  ): UpdatesBuilder<A, C, E>;
  on<K extends keyof C & string>(
    name: K,
    guard: Guard<A, C, K>,
    action: Action<A, C, E, K>
  ): UpdatesBuilder<A, C, E>;
  on<K extends keyof C & string>(
    name: K,
    ...args: [Action<A, C, E, K>] | [Guard<A, C, K>, Action<A, C, E, K>]
  ): UpdatesBuilder<A, C, E> {
    const [guard, action]: [Guard<A, C, K> | undefined, Action<A, C, E, K>] =
      args.length === 1 ? [undefined, args[0]] : args;
    return this.processCommands((command, aggregate) => {
      if (!is<C, K>(command, name)) return undefined;
      const message: Message<C, K> = command;
      if (guard && !guard(message, aggregate)) return undefined;
      return () => action(message, aggregate);
    });
  }

  when(
    predicate: (command: Command<C>, aggregate: A) => boolean,
    action: (command: Command<C>, aggregate: A) => UpdateYield<E>
  ): UpdatesBuilder<A, C, E> {
    return this.processCommands((command, aggregate) =>
      predicate(command, aggregate) ? () => action(command, aggregate) : undefined
    );
  }

  /**
   * Folds events by name into the next aggregate
   * @param name the event name
   * @param fold returns the next aggregate, never mutating the current one
   */
  apply<K extends keyof E & string>(
    name: K,
    fold: (aggregate: A, event: Message<E, K>) => A
  ): UpdatesBuilder<A, C, E> {
    return this.handleEvents((aggregate, event) => {
      if (!is<E, K>(event, name)) return undefined;
      const message: Message<E, K> = event;
      return () => fold(aggregate, message);
    });
  }

  applyWhen(
    predicate: (aggregate: A, event: Event<E>) => boolean,
    fold: (aggregate: A, event: Event<E>) => A
  ): UpdatesBuilder<A, C, E> {
    return this.handleEvents((aggregate, event) =>
      predicate(aggregate, event) ? () => fold(aggregate, event) : undefined
    );
  }
}
