import type { Message, MessageLike, Messages } from "../types";

/**
 * Narrows a message by name
 * @param message the message
 * @param name the expected name
 */
export const is = <M extends Messages, K extends keyof M & string>(
  message: MessageLike,
  name: K
): message is Message<M, K> => message.name === name;

/**
 * Finds the first rule defined at the input, in registration order
 * @param rules the ordered rules
 * @param input the rule input
 * @returns the deferred action of the first matching rule
 */
export const first = <I extends unknown[], O>(
  rules: ReadonlyArray<(...input: I) => (() => O) | undefined>,
  ...input: I
): (() => O) | undefined => {
  for (const rule of rules) {
    const action = rule(...input);
    if (action) return action;
  }
  return undefined;
};
