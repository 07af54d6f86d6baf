import type { MessageLike } from "./messages";

/**
 * Engine error types
 * - `ERR_VALIDATION` schema validation error
 * - `ERR_CONFIGURATION` behavior builder misuse
 * - `ERR_INVALID_CREATION_COMMAND` no creation rule matched the command
 * - `ERR_INVALID_UPDATE_COMMAND` no update rule matched the command
 * - `ERR_COMMAND_FAILED` the matched action failed
 * - `ERR_PRECONDITION` the matched action rejected a domain precondition
 * - `ERR_NO_EVENTS` the matched update action produced no events
 * - `ERR_AGGREGATE_MISMATCH` the creation event creates an aggregate with another id
 * - `ERR_UNHANDLED_EVENT` no creation fold matched the event
 * - `ERR_CONCURRENCY` optimistic concurrency validation error on commits
 */
export const Errors = {
  ValidationError: "ERR_VALIDATION",
  ConfigurationError: "ERR_CONFIGURATION",
  InvalidCreationCommand: "ERR_INVALID_CREATION_COMMAND",
  InvalidUpdateCommand: "ERR_INVALID_UPDATE_COMMAND",
  CommandFailed: "ERR_COMMAND_FAILED",
  PreconditionError: "ERR_PRECONDITION",
  NoEvents: "ERR_NO_EVENTS",
  AggregateMismatch: "ERR_AGGREGATE_MISMATCH",
  UnhandledEventError: "ERR_UNHANDLED_EVENT",
  ConcurrencyError: "ERR_CONCURRENCY"
} as const;

/**
 * Rejection codes carried by command rejections
 */
export type RejectionCode =
  | typeof Errors.InvalidCreationCommand
  | typeof Errors.InvalidUpdateCommand
  | typeof Errors.CommandFailed
  | typeof Errors.PreconditionError
  | typeof Errors.NoEvents
  | typeof Errors.AggregateMismatch;

export class ValidationError extends Error {
  public readonly details;
  constructor(errors: string[]) {
    super(`failed validation ${errors.map((e) => `[${e}]`).join(" ")}`);
    this.name = Errors.ValidationError;
    this.details = { errors };
  }
}

export class ConfigurationError extends Error {
  constructor(behavior: string, problem: string) {
    super(`Behavior "${behavior}" is not fully configured: ${problem}`);
    this.name = Errors.ConfigurationError;
  }
}

/**
 * Domain precondition failures signaled by command actions
 */
export class PreconditionError extends Error {
  public readonly details;
  constructor(reason: string, details?: Record<string, unknown>) {
    super(reason);
    this.name = Errors.PreconditionError;
    this.details = details;
  }
}

/**
 * Expected outcome of command validation when the command is not accepted.
 * Carried by `Validation` results, never thrown across the engine boundary.
 */
export class CommandRejection extends Error {
  public readonly details;
  constructor(
    public readonly code: RejectionCode,
    reason: string,
    command: MessageLike,
    aggregateId?: string,
    cause?: unknown
  ) {
    super(reason, { cause });
    this.name = code;
    this.details = { command, aggregateId };
  }
}

/**
 * Fatal fold error: the event history does not match the behavior
 */
export class UnhandledEventError extends Error {
  public readonly details;
  constructor(behavior: string, event: MessageLike) {
    super(`Behavior "${behavior}" cannot create an aggregate from "${event.name}"`);
    this.name = Errors.UnhandledEventError;
    this.details = { event };
  }
}

export class ConcurrencyError extends Error {
  constructor(
    public readonly lastVersion: number,
    public readonly events: MessageLike[],
    public readonly expectedVersion: number
  ) {
    super(
      `Concurrency error committing event "${
        events.at(0)?.name
      }". Expected version ${expectedVersion} but found version ${lastVersion}.`
    );
    this.name = Errors.ConcurrencyError;
  }
}
