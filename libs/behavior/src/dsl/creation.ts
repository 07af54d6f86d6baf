import type {
  AggregateLike,
  Command,
  CreationCommandRule,
  CreationEventRule,
  CreationYield,
  Event,
  Message,
  Messages
} from "../types";
import { is } from "./rules";

type Guard<C extends Messages, K extends keyof C & string> = (
  command: Message<C, K>
) => boolean;

type Action<
  C extends Messages,
  E extends Messages,
  K extends keyof C & string
> = (command: Message<C, K>) => CreationYield<E>;

/**
 * Accumulates the rules that apply when there is no aggregate yet
 * - command rules validate the creation command and yield the creation event
 * - event rules fold the creation event into a new aggregate
 *
 * Builders are immutable: every registration returns a new builder with the
 * new rules appended after the existing ones, so they can be shared and branched.
 */
export class CreationBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> {
  constructor(
    readonly commands: ReadonlyArray<CreationCommandRule<C, E>> = [],
    readonly events: ReadonlyArray<CreationEventRule<A, E>> = []
  ) {}

  /**
   * Appends a set of command rules
   * @param rules the rules, tried in order after the existing ones
   */
  processCommands(
    ...rules: CreationCommandRule<C, E>[]
  ): CreationBuilder<A, C, E> {
    return new CreationBuilder(this.commands.concat(rules), this.events);
  }

  /**
   * Appends a set of event rules
   * @param rules the rules, tried in order after the existing ones
   */
  handleEvents(...rules: CreationEventRule<A, E>[]): CreationBuilder<A, C, E> {
    return new CreationBuilder(this.commands, this.events.concat(rules));
  }

  /**
   * Handles commands by name
   * @param name the command name
   * @param action yields the creation event
   */
  on<K extends keyof C & string>(
    name: K,
    action: Action<C, E, K>
  ): CreationBuilder<A, C, E>;
  /**
   * Handles commands by name when the guard holds
   * @param name the command name
   * @param guard the command guard
   * @param action yields the creation event
   */
  on<K extends keyof C & string>(
    name: K,
    guard: Guard<C, K>,
    action: Action<C, E, K>
  ): CreationBuilder<A, C, E>;
  on<K extends keyof C & string>(
    name: K,
    ...args: [Action<C, E, K>] | [Guard<C, K>, Action<C, E, K>]
  ): CreationBuilder<A, C, E> {
    const [guard, action]: [Guard<C, K> | undefined, Action<C, E, K>] =
      args.length === 1 ? [undefined, args[0]] : args;
    return this.processCommands((command) => {
      if (!is<C, K>(command, name)) return undefined;
      const message: Message<C, K> = command;
      if (guard && !guard(message)) return undefined;
      return () => action(message);
    });
  }

  /**
   * Handles commands matching a predicate
   * @param predicate the command predicate
   * @param action yields the creation event
   */
  when(
    predicate: (command: Command<C>) => boolean,
    action: (command: Command<C>) => CreationYield<E>
  ): CreationBuilder<A, C, E> {
    return this.processCommands((command) =>
      predicate(command) ? () => action(command) : undefined
    );
  }

  /**
   * Folds creation events by name
   * @param name the event name
   * @param fold creates the aggregate
   */
  apply<K extends keyof E & string>(
    name: K,
    fold: (event: Message<E, K>) => A
  ): CreationBuilder<A, C, E> {
    return this.handleEvents((event) => {
      if (!is<E, K>(event, name)) return undefined;
      const message: Message<E, K> = event;
      return () => fold(message);
    });
  }

  /**
   * Folds creation events matching a predicate
   * @param predicate the event predicate
   * @param fold creates the aggregate
   */
  applyWhen(
    predicate: (event: Event<E>) => boolean,
    fold: (event: Event<E>) => A
  ): CreationBuilder<A, C, E> {
    return this.handleEvents((event) =>
      predicate(event) ? () => fold(event) : undefined
    );
  }
}
