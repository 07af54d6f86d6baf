import { PreconditionError } from "../types";

/** Shapes an action can yield for a produced value `T` */
export type Yield<T> = T | Error | Promise<T> | (() => T);

/**
 * Normalized action outcomes
 * - `value` produced immediately
 * - `failure` failed immediately
 * - `deferred` produced or failed asynchronously
 */
export type Outcome<T> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "failure"; readonly error: unknown }
  | { readonly kind: "deferred"; readonly promise: Promise<T> };

const isThunk = <T>(value: unknown): value is () => T =>
  typeof value === "function";

/**
 * Classifies what an action yields, running fallible computations
 * @param produce invokes the action
 * @returns the outcome
 */
export const outcome = <T>(produce: () => Yield<T>): Outcome<T> => {
  try {
    const value = produce();
    if (value instanceof Error) return { kind: "failure", error: value };
    if (value instanceof Promise) return { kind: "deferred", promise: value };
    if (isThunk<T>(value)) return { kind: "value", value: value() };
    return { kind: "value", value };
  } catch (error) {
    return { kind: "failure", error };
  }
};

/**
 * Settles an outcome into a promise
 * @param outcome the outcome
 * @returns promise resolving to the value, or rejecting with the failure
 */
export const settle = <T>(outcome: Outcome<T>): Promise<T> => {
  switch (outcome.kind) {
    case "value":
      return Promise.resolve(outcome.value);
    case "failure":
      return Promise.reject(outcome.error);
    case "deferred":
      return outcome.promise;
  }
};

/**
 * Normalizes any action yield into a promise
 * @param produce invokes the action
 */
export const normalize = <T>(produce: () => Yield<T>): Promise<T> =>
  settle(outcome(produce));

/**
 * Builds a domain precondition failure for actions to yield or throw
 * @param reason human readable reason
 * @param details optional details
 * @example
 ```ts
 .on("Withdraw", ({ data }, account) =>
    account.balance < data.amount
      ? reject("Insufficient funds", { balance: account.balance })
      : { name: "Withdrawn", data })
 ```
 */
export const reject = (
  reason: string,
  details?: Record<string, unknown>
): PreconditionError => new PreconditionError(reason, details);
