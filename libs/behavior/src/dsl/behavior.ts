import { log } from "../ports";
import {
  accepted,
  CommandRejection,
  ConfigurationError,
  Errors,
  PreconditionError,
  rejected,
  UnhandledEventError,
  type AggregateLike,
  type Behavior,
  type Command,
  type CreationYield,
  type Event,
  type MessageLike,
  type Messages,
  type UpdateYield
} from "../types";
import type { CreationBuilder } from "./creation";
import { normalize } from "./outcome";
import { first } from "./rules";
import type { UpdatesBuilder } from "./updates";

const describe = ({ name, data }: MessageLike): string => {
  try {
    return `${name} ${JSON.stringify(data)}`;
  } catch {
    return name;
  }
};

/**
 * Maps action failures to rejections
 * @param error what the action failed with
 * @param command the command
 * @param aggregateId the aggregate id, when updating
 */
const toRejection = (
  error: unknown,
  command: MessageLike,
  aggregateId?: string
): CommandRejection => {
  if (error instanceof CommandRejection) return error;
  if (error instanceof PreconditionError)
    return new CommandRejection(
      Errors.PreconditionError,
      error.message,
      command,
      aggregateId,
      error
    );
  return new CommandRejection(
    Errors.CommandFailed,
    error instanceof Error ? error.message : String(error),
    command,
    aggregateId,
    error
  );
};

/**
 * Compiles creation and update rules into an immutable behavior
 * @param name the behavior name, used in logs and errors
 * @param creation the creation rules
 * @param updates the update rules
 * @returns the behavior
 */
export const compile = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  name: string,
  creation: CreationBuilder<A, C, E>,
  updates: UpdatesBuilder<A, C, E>
): Behavior<A, C, E> => {
  if (!creation.commands.length)
    throw new ConfigurationError(name, "missing creation command rules");
  if (!creation.events.length)
    throw new ConfigurationError(name, "missing creation event rules");
  if (!updates.commands.length)
    throw new ConfigurationError(name, "missing update command rules");

  const creationCommands = [...creation.commands];
  const creationEvents = [...creation.events];
  const updateCommands = [...updates.commands];
  const updateEvents = [...updates.events];

  // catch-all rules, tried after every registered rule
  const invalidOnCreation =
    (command: Command<C>) => (): CreationYield<E> =>
      new CommandRejection(
        Errors.InvalidCreationCommand,
        `Invalid command ${describe(command)}`,
        command
      );
  const invalidOnUpdate =
    (command: Command<C>, aggregate: A) => (): UpdateYield<E> =>
      new CommandRejection(
        Errors.InvalidUpdateCommand,
        `Invalid command ${describe(command)} for aggregate ${aggregate.id}`,
        command,
        aggregate.id
      );

  return Object.freeze({
    name,

    validateCreation: async (command: Command<C>) => {
      let event: Event<E>;
      try {
        const action =
          first(creationCommands, command) ?? invalidOnCreation(command);
        event = await normalize<Event<E>>(action);
      } catch (error) {
        const rejection = toRejection(error, command);
        log().yellow().trace(`${name} ${rejection.name}`, rejection.message);
        return rejected<Event<E>>(rejection);
      }
      log().green().trace(`${name} ${command.name} => ${event.name}`);
      return accepted(event);
    },

    validateUpdate: async (command: Command<C>, aggregate: A) => {
      let yielded: Event<E> | Event<E>[];
      try {
        const action =
          first(updateCommands, command, aggregate) ??
          invalidOnUpdate(command, aggregate);
        yielded = await normalize<Event<E> | Event<E>[]>(action);
      } catch (error) {
        const rejection = toRejection(error, command, aggregate.id);
        log().yellow().trace(`${name} ${rejection.name}`, rejection.message);
        return rejected<Event<E>[]>(rejection);
      }
      const events: Event<E>[] = Array.isArray(yielded) ? yielded : [yielded];
      if (!events.length)
        return rejected<Event<E>[]>(
          new CommandRejection(
            Errors.NoEvents,
            `Command ${command.name} produced no events for aggregate ${aggregate.id}`,
            command,
            aggregate.id
          )
        );
      log()
        .green()
        .trace(
          `${name} ${command.name} => ${events.map((e) => e.name).join(",")}`
        );
      return accepted(events);
    },

    applyCreation: (event: Event<E>) => {
      const fold = first(creationEvents, event);
      if (!fold) throw new UnhandledEventError(name, event);
      return fold();
    },

    applyUpdate: (aggregate: A, event: Event<E>) => {
      const fold = first(updateEvents, aggregate, event);
      return fold ? fold() : aggregate;
    },

    isCreationEventDefined: (event: Event<E>) =>
      first(creationEvents, event) !== undefined,

    isUpdateEventDefined: (aggregate: A, event: Event<E>) =>
      first(updateEvents, aggregate, event) !== undefined
  });
};
